import test from "node:test";
import assert from "node:assert/strict";
import { execFile } from "node:child_process";
import { mkdtemp, symlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { promisify } from "node:util";

const run = promisify(execFile);
const entry = fileURLToPath(new URL("./cli.ts", import.meta.url));

// npm links bins, so the entry must run when reached through a symlink.
test("launchq runs when started through a linked bin", async () => {
  const dir = await mkdtemp(join(tmpdir(), "launchq-bin-"));
  const linked = join(dir, "launchq.ts");
  await symlink(entry, linked);

  const { stdout } = await run(process.execPath, ["--import", "tsx", linked, "--help"]);
  assert.match(stdout, /^Usage: launchq /);
  assert.match(stdout, /\n  trigger \[options\] \[queue\]/);
});
