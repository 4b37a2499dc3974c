import type { Result } from "~shared/utils/Result";

import type { FilePair, NamingConvention, PairingWarning } from "@/types";

import type { ScanError } from "./FileSystemScanner";

export type CorrelateResult = {
  pairs: FilePair[];
  warnings: PairingWarning[];
};

export interface FileCorrelator {
  /** 只看 directory 本層，不遞迴 */
  findPairs(
    directory: string,
    convention?: NamingConvention
  ): Promise<Result<CorrelateResult, ScanError>>;
}
