import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, isErr, ok } from "~shared/utils/Result";

import { defaultNamingConvention } from "@/constants";
import type { FilePair, NamingConvention, PairingWarning } from "@/types";
import { kindOf, toMediaFile } from "@/utils/helper";

import type { CorrelateResult, FileCorrelator } from "./FileCorrelator";
import type { FileSystemScanner, ScanError } from "./FileSystemScanner";

export class FileCorrelatorDefault implements FileCorrelator {
  private readonly scanner: FileSystemScanner;
  private readonly logger: Logger;

  constructor(deps: { scanner: FileSystemScanner; logger: Logger }) {
    this.scanner = deps.scanner;
    this.logger = deps.logger.extend("FileCorrelator");
  }

  async findPairs(
    directory: string,
    convention: NamingConvention = defaultNamingConvention
  ): Promise<Result<CorrelateResult, ScanError>> {
    const scanned = await this.scanner.scan(directory);
    if (isErr(scanned)) return scanned;

    const result = correlate(scanned.value, convention);
    this.logger.debug({
      pairs: result.pairs.length,
      warnings: result.warnings.length,
    })`配對完成 ${directory}`;
    return ok(result);
  }
}

/**
 * 依檔名規則配對：
 *   prefix + X + marker + processedExtension ↔ prefix + X + originalExtension
 */
export function correlate(
  filePaths: readonly string[],
  convention: NamingConvention
): CorrelateResult {
  const { prefix, originalExtension, processedMarker, processedExtension } =
    convention;
  const processedSuffix = processedMarker + processedExtension;
  const byName = new Map(
    filePaths.map((p): [string, string] => [path.basename(p), p])
  );

  const pairs: FilePair[] = [];
  const warnings: PairingWarning[] = [];
  const pairedOriginals = new Set<string>();

  for (const [name, fullPath] of byName) {
    if (!name.startsWith(prefix)) continue;
    if (!name.endsWith(processedSuffix)) continue;
    const baseName = name.slice(0, -processedSuffix.length);
    if (baseName.length <= prefix.length) continue;

    const originalName = baseName + originalExtension;
    const originalPath = byName.get(originalName);
    if (originalPath === undefined) {
      warnings.push({
        type: "PAIRING_WARNING",
        reason: "MISSING_ORIGINAL",
        filePath: fullPath,
        message: `找不到原始檔 ${originalName}`,
      });
      continue;
    }
    pairedOriginals.add(originalName);
    pairs.push({
      baseName,
      original: toMediaFile(originalPath, kindOf(originalPath) ?? "video"),
      processed: toMediaFile(fullPath, kindOf(fullPath) ?? "video"),
    });
  }

  for (const [name, fullPath] of byName) {
    if (!name.startsWith(prefix) || !name.endsWith(originalExtension)) continue;
    if (name.endsWith(processedSuffix) || pairedOriginals.has(name)) continue;
    warnings.push({
      type: "PAIRING_WARNING",
      reason: "MISSING_PROCESSED",
      filePath: fullPath,
      message: `找不到轉檔後的 ${name.slice(0, -originalExtension.length)}${processedSuffix}`,
    });
  }

  return { pairs, warnings };
}
