/**
 * Manifest writer interface
 */

/**
 * Manifest formats:
 * - `simple` - only file names are listed
 * - `full` - location, file name, size and modification time (seconds)
 */
export type ManifestMode = "simple" | "full";

export const MANIFEST_MODES: readonly ManifestMode[] = ["simple", "full"];

export interface ListFilesResult {
  outputPath: string;
  filesListed: number;
}

export interface IFileLister {
  /**
   * Write a delimited list of the files directly inside a directory
   *
   * The output file is truncated or created, receives one header line and one
   * line per regular file, and is closed whether or not writing succeeds.
   *
   * @param directory - Directory to list (not recursive)
   * @param mode - Manifest format (default: "simple")
   * @param outputPath - File to write (default: "files_list.csv")
   * @param separator - Field separator, usually "," or "\t" (default: ",")
   * @throws UnsupportedModeError if mode is not "simple" or "full"
   *
   * @example
   * ```typescript
   * await lister.listFiles("inbox", "full", "inbox.tsv", "\t");
   * // location\tfilename\tsize\tlast_modified
   * // inbox\ta.txt\t12\t1700000000.5
   * ```
   */
  listFiles(
    directory: string,
    mode?: string,
    outputPath?: string,
    separator?: string
  ): Promise<ListFilesResult>;
}
