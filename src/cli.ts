#!/usr/bin/env -S npx tsx
import { buildProgram } from "./program";

buildProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error("❌ Fatal error:", error);
    process.exit(1);
  });
