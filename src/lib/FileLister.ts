/**
 * Manifest writer implementation
 */

import * as fs from "fs";
import * as path from "path";
import {
  IFileLister,
  ListFilesResult,
  ManifestMode,
  MANIFEST_MODES,
} from "../interfaces/IFileLister";
import { ILogger } from "../interfaces/ILogger";
import { UnsupportedModeError } from "../types";
import { StderrLogger } from "./Logger";

export const DEFAULT_MANIFEST_PATH = "files_list.csv";

const HEADERS: Record<ManifestMode, string[]> = {
  simple: ["file_name"],
  full: ["location", "filename", "size", "last_modified"],
};

export function isManifestMode(mode: string): mode is ManifestMode {
  return MANIFEST_MODES.some((known) => known === mode);
}

export class FileLister implements IFileLister {
  private logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? new StderrLogger("info", "FileLister");
  }

  async listFiles(
    directory: string,
    mode: string = "simple",
    outputPath: string = DEFAULT_MANIFEST_PATH,
    separator: string = ","
  ): Promise<ListFilesResult> {
    if (!isManifestMode(mode)) {
      throw new UnsupportedModeError(mode);
    }

    let filesListed = 0;
    const fd = fs.openSync(outputPath, "w");

    try {
      fs.writeSync(fd, HEADERS[mode].join(separator) + "\n");

      for (const item of fs.readdirSync(directory)) {
        const filePath = path.join(directory, item);
        const stats = fs.statSync(filePath, { throwIfNoEntry: false });
        if (!stats || !stats.isFile()) {
          continue;
        }

        const fields =
          mode === "simple"
            ? [item]
            : [directory, item, String(stats.size), String(stats.mtimeMs / 1000)];
        fs.writeSync(fd, fields.join(separator) + "\n");
        filesListed++;
      }
    } finally {
      fs.closeSync(fd);
    }

    this.logger.info(`${filesListed} files listed`, {
      directory,
      mode,
      outputPath,
    });

    return { outputPath, filesListed };
  }
}
