import { rm } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import {
  companionExtension,
  companionSuffix,
  coordinateTags,
  imageDateTags,
  placeholderCoordinates,
  videoDateTags,
} from "@/constants";
import type {
  StampError,
  TagAbsentFallback,
  TagValues,
  ToolInvocationError,
} from "@/types";
import { baseOf, exists } from "@/utils/helper";
import { localUtcOffsetHours, resolveLookupTime } from "@/utils/timeShift";

import { resolveLookupShift, resolveVideoTimeShift } from "./CameraProfiles";

import type {
  GeotagOptions,
  GeotagOutcome,
  GeotagPipeline,
  PipelineError,
  TransferOutcome,
} from "./GeotagPipeline";
import type { MetadataTool } from "./MetadataTool";
import { parseExifTimestamp } from "./MetadataTool/ExifDateTimeHelper";

export function companionPathOf(videoPath: string) {
  return path.join(
    path.dirname(videoPath),
    baseOf(videoPath) + companionSuffix + companionExtension
  );
}

export class GeotagPipelineDefault implements GeotagPipeline {
  private readonly metadataTool: MetadataTool;
  private readonly logger: Logger;
  private readonly localUtcOffsetHours: number;

  constructor(deps: {
    metadataTool: MetadataTool;
    logger: Logger;
    /** 只有 auto 偏移會用到，預設為本機時區 */
    localUtcOffsetHours?: number;
  }) {
    this.metadataTool = deps.metadataTool;
    this.logger = deps.logger.extend("GeotagPipeline");
    this.localUtcOffsetHours = deps.localUtcOffsetHours ?? localUtcOffsetHours();
  }

  async geotagVideo(
    videoPath: string,
    trackLogs: readonly string[],
    options: GeotagOptions = {}
  ): Promise<Result<GeotagOutcome, PipelineError>> {
    const timeShiftHours = resolveLookupShift(
      options.timeShiftHours ?? 0,
      videoPath,
      this.localUtcOffsetHours,
      true
    );
    const videoTimeShiftHours = resolveVideoTimeShift(
      options.videoTimeShiftHours ?? 0,
      videoPath,
      this.localUtcOffsetHours
    );
    const companion = companionPathOf(videoPath);
    const companionReused = await exists(companion);

    try {
      const stamped = await this.stamp(videoPath, companion, companionReused);
      if (isErr(stamped)) return stamped;

      const fileTime = parseExifTimestamp(stamped.value);
      const lookupTime = fileTime
        ? resolveLookupTime(fileTime, timeShiftHours).toISOString()
        : undefined;
      this.logger.debug({ lookupTime })`以 ${stamped.value} 比對軌跡（偏移 ${timeShiftHours} 小時）`;

      const tagged = await this.metadataTool.geotag(
        [companion],
        trackLogs,
        timeShiftHours
      );
      if (isErr(tagged)) return tagged;
      const [failure] = tagged.value.failures;
      if (failure) return err(failure);

      const transferred = await this.transfer(companion, videoPath);
      if (isErr(transferred)) return transferred;

      const shifted = await this.metadataTool.shiftTags(
        videoPath,
        videoDateTags,
        videoTimeShiftHours
      );
      if (isErr(shifted)) return shifted;

      return ok({
        ...transferred.value,
        video: videoPath,
        companion,
        companionReused,
        lookupTime,
        timeShiftHours,
        videoTimeShiftHours,
      });
    } finally {
      if (!companionReused) await rm(companion, { force: true });
    }
  }

  async transfer(
    sourcePath: string,
    targetPath: string
  ): Promise<Result<TransferOutcome, ToolInvocationError>> {
    const copied = await this.metadataTool.copyTags(
      sourcePath,
      targetPath,
      coordinateTags
    );
    if (isErr(copied)) return copied;

    const read = await this.metadataTool.readTags(sourcePath, coordinateTags);
    if (isErr(read)) return read;
    const { GPSCoordinates, GPSLatitude, GPSLongitude, GPSAltitude } =
      read.value;

    if (GPSCoordinates !== undefined) {
      return ok(
        this.outcome(sourcePath, targetPath, GPSCoordinates, "copied")
      );
    }

    if (GPSLatitude !== undefined && GPSLongitude !== undefined) {
      const coordinates = `${GPSLatitude}, ${GPSLongitude}, ${GPSAltitude ?? "0"}`;
      const written = await this.metadataTool.writeTags(targetPath, {
        GPSCoordinates: coordinates,
      });
      if (isErr(written)) return written;
      return ok(
        this.outcome(sourcePath, targetPath, coordinates, "synthesized")
      );
    }

    const written = await this.metadataTool.writeTags(
      targetPath,
      placeholderCoordinates
    );
    if (isErr(written)) return written;
    const warning: TagAbsentFallback = {
      type: "TAG_ABSENT_FALLBACK",
      filePath: targetPath,
      tags: [...coordinateTags],
      message: `來源沒有座標，已寫入預設值: ${sourcePath}`,
    };
    this.logger.warn({ target: targetPath })`${sourcePath} 沒有座標，${targetPath} 寫入 0, 0, 0`;
    return ok({
      ...this.outcome(sourcePath, targetPath, "0, 0, 0", "placeholder"),
      warnings: [warning],
    });
  }

  private outcome(
    source: string,
    target: string,
    coordinates: string,
    coordinateSource: TransferOutcome["coordinateSource"]
  ): TransferOutcome {
    return { source, target, coordinates, coordinateSource, warnings: [] };
  }

  /** 把影片的 CreateDate 寫到 companion 的所有影像時間標籤 */
  private async stamp(
    videoPath: string,
    companion: string,
    reuse: boolean
  ): Promise<Result<string, StampError>> {
    const read = await this.metadataTool.readTags(videoPath, [
      "CreateDate",
      "DateTimeOriginal",
    ]);
    if (isErr(read)) return err(stampError(videoPath, read.error.message));

    const createDate = read.value.CreateDate ?? read.value.DateTimeOriginal;
    if (createDate === undefined) {
      return err(stampError(videoPath, "影片沒有 CreateDate"));
    }

    const tags: TagValues = Object.fromEntries(
      imageDateTags.map((name): [string, string] => [name, createDate])
    );
    const written = await this.metadataTool.writeTags(
      companion,
      tags,
      reuse ? undefined : { createFrom: videoPath }
    );
    if (isErr(written)) return err(stampError(videoPath, written.error.message));

    return ok(createDate);
  }
}

function stampError(filePath: string, message: string): StampError {
  return { type: "STAMP_FAILED", filePath, message };
}
