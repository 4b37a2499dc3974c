import fg from "fast-glob";
import { stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { companionExtension } from "@/constants";
import { kindOf } from "@/utils/helper";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options: ScanOptions = {}
  ): Promise<Result<string[], ScanError>> {
    const kinds = options.kinds;
    try {
      const info = await stat(rootPath);
      if (!info.isDirectory()) {
        return err({ type: "SCAN_FAILED", message: `不是資料夾: ${rootPath}` });
      }
      const entries = await fg(options.pattern ?? "*", {
        cwd: rootPath,
        deep: 1,
        onlyFiles: true,
        unique: true,
        dot: false,
        caseSensitiveMatch: false,
        followSymbolicLinks: false,
      });
      const files = entries
        .filter((name) => {
          if (path.extname(name).toLowerCase() === companionExtension) {
            return false;
          }
          if (!kinds) return true;
          const kind = kindOf(name);
          return kind !== undefined && kinds.includes(kind);
        })
        .map((name) => path.join(rootPath, name))
        .sort((a, b) => a.localeCompare(b));
      return ok(files);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
