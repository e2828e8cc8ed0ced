/**
 * Flat recursive copy implementation
 */

import * as fs from "fs";
import * as path from "path";
import {
  IFileCopier,
  FlatCopyOptions,
  FlatCopyResult,
  CopiedFile,
} from "../interfaces/IFileCopier";
import { ILogger } from "../interfaces/ILogger";
import { DestinationNameExhaustedError } from "../types";
import { CaseInsensitiveString } from "./CaseInsensitiveString";
import { StderrLogger } from "./Logger";

export const DEFAULT_MAX_COLLISION_ATTEMPTS = 10000;

export interface FileCopierOptions {
  logger?: ILogger;
  /** Upper bound on numbered candidates tried for one file */
  maxCollisionAttempts?: number;
}

export class FileCopier implements IFileCopier {
  private logger: ILogger;
  private maxCollisionAttempts: number;

  constructor(options: FileCopierOptions = {}) {
    this.logger = options.logger ?? new StderrLogger("info", "FileCopier");
    this.maxCollisionAttempts =
      options.maxCollisionAttempts ?? DEFAULT_MAX_COLLISION_ATTEMPTS;
  }

  async copyRecursively(
    source: string,
    destination: string,
    extension?: string | null,
    options: FlatCopyOptions = {}
  ): Promise<FlatCopyResult> {
    const startTime = Date.now();
    const filter =
      extension === undefined || extension === null
        ? null
        : new CaseInsensitiveString(extension.replace(/^\./, ""));

    const copied: CopiedFile[] = [];
    const bytesTransferred = await this.walk(
      source,
      destination,
      filter,
      options.preserveMetadata || false,
      copied
    );

    this.logger.info(`${copied.length} files copied`, {
      source,
      destination,
      extension: filter ? filter.toString() : null,
    });

    return {
      filesCopied: copied.length,
      bytesTransferred,
      duration: Date.now() - startTime,
      copied,
    };
  }

  /**
   * Extension of a file name without the dot; empty for "README" and for
   * dot-files such as ".bashrc"
   */
  static extensionOf(fileName: string): string {
    return path.extname(fileName).slice(1);
  }

  /**
   * First free path for `fileName` in `directory`: the name itself, then
   * base0.ext, base1.ext, ...
   *
   * Any entry occupies a name, including a symlink whose target is gone.
   */
  resolveDestination(directory: string, fileName: string): string {
    let candidate = path.join(directory, fileName);
    if (!this.isOccupied(candidate)) {
      return candidate;
    }

    const ext = path.extname(fileName);
    const base = fileName.slice(0, fileName.length - ext.length);

    for (let seq = 0; seq < this.maxCollisionAttempts; seq++) {
      candidate = path.join(directory, `${base}${seq}${ext}`);
      if (!this.isOccupied(candidate)) {
        return candidate;
      }
    }

    throw new DestinationNameExhaustedError(
      fileName,
      this.maxCollisionAttempts
    );
  }

  private isOccupied(candidate: string): boolean {
    return fs.lstatSync(candidate, { throwIfNoEntry: false }) !== undefined;
  }

  /**
   * Regular files and symlinks to regular files count; links to directories
   * are not followed and dangling links are skipped
   */
  private isCopyableFile(entry: fs.Dirent, sourcePath: string): boolean {
    if (entry.isFile()) {
      return true;
    }
    if (!entry.isSymbolicLink()) {
      return false;
    }
    const target = fs.statSync(sourcePath, { throwIfNoEntry: false });
    return target !== undefined && target.isFile();
  }

  private async walk(
    source: string,
    destination: string,
    filter: CaseInsensitiveString | null,
    preserveMetadata: boolean,
    copied: CopiedFile[]
  ): Promise<number> {
    let bytesTransferred = 0;

    const entries = fs.readdirSync(source, { withFileTypes: true });

    for (const entry of entries) {
      const sourcePath = path.join(source, entry.name);

      if (entry.isDirectory()) {
        bytesTransferred += await this.walk(
          sourcePath,
          destination,
          filter,
          preserveMetadata,
          copied
        );
      } else if (this.isCopyableFile(entry, sourcePath)) {
        if (filter && !filter.equalsFold(FileCopier.extensionOf(entry.name))) {
          continue;
        }

        const destPath = this.resolveDestination(destination, entry.name);
        const stats = fs.statSync(sourcePath);
        fs.copyFileSync(sourcePath, destPath, fs.constants.COPYFILE_EXCL);

        if (preserveMetadata) {
          fs.utimesSync(destPath, stats.atime, stats.mtime);
        }

        this.logger.debug("Copied file", {
          source: sourcePath,
          destination: destPath,
        });
        copied.push({ source: sourcePath, destination: destPath });
        bytesTransferred += stats.size;
      }
    }

    return bytesTransferred;
  }
}
