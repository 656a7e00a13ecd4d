/**
 * CLI - Node File System Host
 */

import { readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join, basename, resolve } from "node:path";
import { FileIoError, FileIoErrorCode, describeError } from "../errors.js";
import type { FileSystemHost, ListFilesOptions } from "./types.js";
import { hasExtension } from "./types.js";

let tempCounter = 0;

export function createNodeHost(): FileSystemHost {
  return {
    async listFiles(root: string, options: ListFilesOptions): Promise<string[]> {
      const files: string[] = [];
      const ignored = new Set(options.ignore);

      async function walk(dir: string): Promise<void> {
        const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
          throw new FileIoError(`Cannot list ${dir}: ${describeError(err)}`, FileIoErrorCode.LIST, dir, { cause: err });
        });
        for (const entry of entries) {
          // Symlinks are not followed
          if (entry.isDirectory()) {
            if (!ignored.has(entry.name)) await walk(join(dir, entry.name));
          } else if (entry.isFile() && hasExtension(entry.name, options.extensions)) {
            files.push(join(dir, entry.name));
          }
        }
      }

      await walk(resolve(root));
      return files.sort();
    },

    async readFile(path: string): Promise<string> {
      try {
        return await readFile(path, "utf8");
      } catch (err) {
        throw new FileIoError(`Cannot read ${path}: ${describeError(err)}`, FileIoErrorCode.READ, path, { cause: err });
      }
    },

    async writeFile(path: string, text: string): Promise<void> {
      // Write beside the target, then rename over it
      const temp = join(dirname(path), `.${basename(path)}.reimport-${process.pid}-${tempCounter++}.tmp`);
      try {
        await writeFile(temp, text, "utf8");
        await rename(temp, path);
      } catch (err) {
        await rm(temp, { force: true });
        throw new FileIoError(`Cannot write ${path}: ${describeError(err)}`, FileIoErrorCode.WRITE, path, { cause: err });
      }
    },
  };
}
