import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "reactive-avatar-"));
  return {
    dir,
    cleanup: async () => {
      await fs.promises.rm(dir, { recursive: true, force: true });
    },
  };
}
