/**
 * rust-skeleton - Print the declarations of every Rust file under a directory
 *
 * Usage:
 *   rust-skeleton              # Scan the current directory
 *   rust-skeleton <root>       # Scan <root> (a directory or one .rs file)
 */

import { Command } from "commander";
import { DEBUG } from "../config";
import { RustSourceParser } from "../lib/parser/rust-parser";
import { printSkeletons } from "../lib/skeleton/runner";

export const skeleton = new Command("rust-skeleton")
  .description(
    "Print fn, struct, enum, trait and impl declarations of Rust sources, without bodies",
  )
  .argument("[root]", "Directory to scan", ".")
  .action(async (root: string) => {
    const parser = new RustSourceParser();

    try {
      await parser.init();
      printSkeletons({
        root,
        parser,
        write: (line) => console.log(line),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Error:", message);
      if (DEBUG && error instanceof Error) {
        console.error(error.stack);
        if (error.cause !== undefined) console.error("Caused by:", error.cause);
      }
      process.exitCode = 1;
    } finally {
      parser.close();
    }
  });
