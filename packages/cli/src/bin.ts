import { fileURLToPath } from "node:url";
import { handle, run } from "@oclif/core";

// Commands are loaded from TypeScript sources, so this entry runs under tsx (`npm run cli`).
run(process.argv.slice(2), { root: fileURLToPath(new URL("..", import.meta.url)) }).catch(
  async (error: unknown) => {
    if (error instanceof Error) {
      // Keeps the exit code a command asked for (`manifest check` exits 2 on a cycle).
      await handle(error);
      return;
    }
    console.error("depload CLI failure");
    process.exitCode = 1;
  },
);
