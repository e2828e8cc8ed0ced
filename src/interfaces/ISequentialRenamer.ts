/**
 * Sequential renamer interface
 */

export interface RenamedFile {
  from: string;
  to: string;
}

export interface SequentialRenameResult {
  filesRenamed: number;
  renamed: RenamedFile[];
}

export interface ISequentialRenamer {
  /**
   * Rename the files directly inside a directory to `stem_NNNNN.ext`
   *
   * Files are numbered in directory enumeration order starting at
   * `startNumber`; subdirectories are skipped without consuming a number.
   * Generated names are not checked against existing files, so a file whose
   * current name equals a generated one can be replaced.
   *
   * @param directory - Directory whose files are renamed (not recursive)
   * @param stem - Name stem, must not be empty
   * @param padding - Zero padding width of the number (default: 5)
   * @param startNumber - First sequence number (default: 0)
   * @throws ValidationError for an empty stem, negative padding or a
   *   non-integer start number
   */
  renameSequential(
    directory: string,
    stem: string,
    padding?: number,
    startNumber?: number
  ): Promise<SequentialRenameResult>;
}
