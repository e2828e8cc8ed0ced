/**
 * Recursive copy interface
 *
 * Copies files from a source tree into a single flat destination directory.
 * Existing destination entries are never overwritten: a colliding name gets a
 * sequence number between its base name and its extension.
 */

export interface FlatCopyOptions {
  /** Also copy access and modification times (default: false) */
  preserveMetadata?: boolean;
}

export interface CopiedFile {
  /** Absolute or caller-relative path of the source file */
  source: string;
  /** Path the file was written to */
  destination: string;
}

export interface FlatCopyResult {
  filesCopied: number;
  bytesTransferred: number;
  /** Wall-clock duration in milliseconds */
  duration: number;
  copied: CopiedFile[];
}

export interface IFileCopier {
  /**
   * Copy every matching file under a directory tree into one directory
   *
   * @param source - Directory to walk (recursively)
   * @param destination - Existing directory receiving the files
   * @param extension - Extension to match without the dot, compared
   *   case-insensitively; null or undefined copies every file
   * @param options - Copy options
   * @throws DestinationNameExhaustedError if no free name is found within the
   *   configured number of attempts
   *
   * @example
   * ```typescript
   * const result = await copier.copyRecursively("photos", "flat", "jpg");
   * // photos/a/IMG.jpg -> flat/IMG.jpg
   * // photos/b/IMG.jpg -> flat/IMG0.jpg
   * ```
   */
  copyRecursively(
    source: string,
    destination: string,
    extension?: string | null,
    options?: FlatCopyOptions
  ): Promise<FlatCopyResult>;
}
