import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { skeleton } from "../src/commands/skeleton";

describe("rust-skeleton command", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "rust-skeleton-cli-"));
    skeleton.exitOverride();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it("prints the skeleton of every file under the root", async () => {
    await fs.mkdir(path.join(root, "src"));
    await fs.writeFile(
      path.join(root, "src", "lib.rs"),
      "pub fn add(a: i32, b: i32) -> i32 { a + b }\n",
    );
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    await skeleton.parseAsync([root], { from: "user" });

    expect(logSpy.mock.calls).toEqual([
      [`// ************* ${path.join("src", "lib.rs")}`],
      ["pub fn add (a : i32 , b : i32) -> i32 ;"],
    ]);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("exits non-zero and names the file that fails to parse", async () => {
    const badFile = path.join(root, "broken.rs");
    await fs.writeFile(badFile, "fn broken( {\n");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    await skeleton.parseAsync([root], { from: "user" });

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    const [label, message] = errorSpy.mock.calls[0];
    expect(label).toBe("Error:");
    expect(message).toContain(`Failed to parse ${badFile}: `);
    expect(process.exitCode).toBe(1);
  });

  it("prints nothing for an empty directory", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    await skeleton.parseAsync([root], { from: "user" });

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });
});
