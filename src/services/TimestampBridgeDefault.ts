import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { cameraTags, copyTimeTags } from "@/constants";
import type { TagValues } from "@/types";

import { canonicalCameraTags } from "./CameraProfiles";
import type { MetadataTool } from "./MetadataTool";
import type {
  BridgeError,
  CopyTimeReport,
  TimestampBridge,
} from "./TimestampBridge";

export class TimestampBridgeDefault implements TimestampBridge {
  private readonly metadataTool: MetadataTool;
  private readonly logger: Logger;

  constructor(deps: { metadataTool: MetadataTool; logger: Logger }) {
    this.metadataTool = deps.metadataTool;
    this.logger = deps.logger.extend("TimestampBridge");
  }

  async copyCreationTime(
    originalPath: string,
    processedPath: string
  ): Promise<Result<CopyTimeReport, BridgeError>> {
    const read = await this.metadataTool.readTags(originalPath, [
      ...copyTimeTags,
      ...cameraTags,
    ]);
    if (isErr(read)) return read;

    const timeTags: TagValues = {};
    for (const name of copyTimeTags) {
      const value = read.value[name];
      if (value !== undefined) timeTags[name] = value;
    }
    if (Object.keys(timeTags).length === 0) {
      return err({
        type: "NO_CREATION_TIME",
        filePath: originalPath,
        message: `原始檔沒有任何時間標籤: ${originalPath}`,
      });
    }

    const tags: TagValues = {
      ...timeTags,
      ...canonicalCameraTags(path.basename(originalPath), read.value),
    };
    const written = await this.metadataTool.writeTags(processedPath, tags);
    if (isErr(written)) return written;

    this.logger.debug({ tags })`已複製時間 ${originalPath} → ${processedPath}`;
    return ok({ source: originalPath, target: processedPath, tags });
  }
}
