/**
 * Sequential renamer implementation
 */

import * as fs from "fs";
import * as path from "path";
import {
  ISequentialRenamer,
  SequentialRenameResult,
  RenamedFile,
} from "../interfaces/ISequentialRenamer";
import { ILogger } from "../interfaces/ILogger";
import { ValidationError } from "../types";
import { StderrLogger } from "./Logger";

export const DEFAULT_PADDING = 5;

/**
 * Left-pad a number with zeros to `width` characters. A minus sign stays in
 * front of the zeros; wider numbers are returned unchanged.
 */
export function zeroPad(value: number, width: number): string {
  const digits = String(Math.abs(value));
  if (value < 0) {
    return "-" + digits.padStart(width - 1, "0");
  }
  return digits.padStart(width, "0");
}

export class SequentialRenamer implements ISequentialRenamer {
  private logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? new StderrLogger("info", "SequentialRenamer");
  }

  async renameSequential(
    directory: string,
    stem: string,
    padding: number = DEFAULT_PADDING,
    startNumber: number = 0
  ): Promise<SequentialRenameResult> {
    if (!stem) {
      throw new ValidationError("Stem argument must not be empty");
    }
    if (!Number.isSafeInteger(padding) || padding < 0) {
      throw new ValidationError(
        `Padding argument must be a non-negative integer: ${padding}`
      );
    }
    if (!Number.isSafeInteger(startNumber)) {
      throw new ValidationError(
        `Start number argument must be an integer: ${startNumber}`
      );
    }

    const renamed: RenamedFile[] = [];
    let seq = startNumber;

    for (const item of fs.readdirSync(directory)) {
      const currentPath = path.join(directory, item);
      const stats = fs.statSync(currentPath, { throwIfNoEntry: false });
      if (!stats || !stats.isFile()) {
        continue;
      }

      const newName = `${stem}_${zeroPad(seq, padding)}${path.extname(item)}`;
      fs.renameSync(currentPath, path.join(directory, newName));

      renamed.push({ from: item, to: newName });
      seq++;
    }

    const filesRenamed = seq - startNumber;
    this.logger.info(`${filesRenamed} files renamed`, { directory, stem });

    return { filesRenamed, renamed };
  }
}
