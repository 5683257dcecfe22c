#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { skeleton } from "./commands/skeleton";

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "../package.json"), {
      encoding: "utf-8",
    }),
  );
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return "0.0.0";
}

skeleton.version(readVersion());

skeleton.parseAsync().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
