#!/usr/bin/env -S node --import tsx

import { EXIT_UNEXPECTED, main } from "./cli.ts";

main().catch(() => {
  console.error("unexpected error occurred");
  process.exitCode = EXIT_UNEXPECTED;
});
