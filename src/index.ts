#!/usr/bin/env node
import { main } from "./cli.js";

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error("[WATCH] Fatal:", e);
    process.exit(1);
  });
