/**
 * CLI - File System Host
 *
 * The engine never touches the disk; everything it reads or writes goes
 * through this interface.
 */

export interface ListFilesOptions {
  /** Extensions to keep, with leading dot */
  extensions: readonly string[];

  /** Directory names skipped wherever they appear */
  ignore: readonly string[];
}

export interface FileSystemHost {
  /**
   * Every matching file below `root`, as absolute paths in sorted order.
   *
   * @throws FileIoError when `root` cannot be listed
   */
  listFiles(root: string, options: ListFilesOptions): Promise<string[]>;

  /** @throws FileIoError */
  readFile(path: string): Promise<string>;

  /**
   * Replace a file's content. Readers never observe a partial write.
   *
   * @throws FileIoError
   */
  writeFile(path: string, text: string): Promise<void>;
}

export function hasExtension(path: string, extensions: readonly string[]): boolean {
  return extensions.some((ext) => path.endsWith(ext));
}
