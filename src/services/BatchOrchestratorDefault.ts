import { mkdir, rename } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { MoveFile, ToolInvocationError } from "@/types";
import { exists, isDirectory, kindOf } from "@/utils/helper";

import {
  type BatchFailure,
  type BatchOrchestrator,
  type BatchRequest,
  type BatchResult,
  type BatchWarning,
  type GeotagDirectoryOptions,
  type GeotagDirectoryResult,
  batchActions,
} from "./BatchOrchestrator";
import type { FileCorrelator } from "./FileCorrelator";
import type { FileSystemScanner, ScanError } from "./FileSystemScanner";
import type { GeotagPipeline } from "./GeotagPipeline";
import type { MetadataTool } from "./MetadataTool";
import type { TimestampBridge } from "./TimestampBridge";

export class BatchOrchestratorDefault implements BatchOrchestrator {
  private readonly scanner: FileSystemScanner;
  private readonly correlator: FileCorrelator;
  private readonly bridge: TimestampBridge;
  private readonly pipeline: GeotagPipeline;
  private readonly metadataTool: MetadataTool;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    correlator: FileCorrelator;
    bridge: TimestampBridge;
    pipeline: GeotagPipeline;
    metadataTool: MetadataTool;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.correlator = deps.correlator;
    this.bridge = deps.bridge;
    this.pipeline = deps.pipeline;
    this.metadataTool = deps.metadataTool;
    this.logger = deps.logger.extend("BatchOrchestrator");
  }

  async run(request: BatchRequest): Promise<BatchResult> {
    const logger = this.logger.extend("run", { directory: request.directory });
    const outputDir = path.resolve(request.directory, request.outputDir);
    const actions = new Set(request.actions ?? batchActions);
    const moved: MoveFile[] = [];
    const warnings: BatchWarning[] = [];
    const failures: BatchFailure[] = [];
    const finish = (geotagged: string[] = [], untagged: string[] = []) => ({
      ok: failures.length === 0,
      moved,
      geotagged,
      untagged,
      warnings,
      failures,
    });

    const found = await this.correlator.findPairs(
      request.directory,
      request.convention
    );
    if (isErr(found)) {
      logger.error({ error: found.error })`掃描失敗 ${request.directory}`;
      failures.push({
        stage: "scan",
        filePath: request.directory,
        ...found.error,
      });
      return finish();
    }

    for (const warning of found.value.warnings) {
      logger.warn({ reason: warning.reason })`${warning.message}`;
      warnings.push(warning);
    }
    logger.info({ emoji: "🔎" })`找到 ${found.value.pairs.length} 組檔案`;

    await mkdir(outputDir, { recursive: true });

    for (const pair of found.value.pairs) {
      const target = path.join(
        outputDir,
        pair.baseName + pair.processed.extension
      );
      if (await exists(target)) {
        logger.error({ emoji: "🧨", target })`目標已存在，略過 ${target}`;
        failures.push({
          stage: "move",
          type: "TARGET_EXISTS",
          filePath: pair.processed.path,
          message: `目標已存在: ${target}`,
        });
        continue;
      }

      try {
        await rename(pair.processed.path, target);
      } catch (error) {
        logger.error({ error })`搬移失敗 ${pair.processed.path}`;
        failures.push({
          stage: "move",
          type: "MOVE_FAILED",
          filePath: pair.processed.path,
          message: error instanceof Error ? error.message : String(error),
        });
        continue;
      }
      moved.push({ from: pair.processed.path, to: target });
      if (!actions.has("copy-time")) {
        logger.info({ emoji: "🚚" })`${pair.baseName} 已搬移`;
        continue;
      }

      const copied = await this.bridge.copyCreationTime(
        pair.original.path,
        target
      );
      if (isErr(copied)) {
        logger.error({ error: copied.error })`複製時間失敗 ${target}`;
        failures.push({ stage: "copy-time", ...copied.error });
        continue;
      }
      logger.info({ emoji: "🕒" })`${pair.baseName} 已搬移並補上時間`;
    }

    if (!actions.has("geotag")) return finish();
    if (request.trackLogs.length === 0) {
      logger.warn("沒有提供 GPS 軌跡，略過 geotag");
      return finish();
    }

    const tagged = await this.geotagDirectory(outputDir, request.trackLogs, {
      timeShiftHours: request.timeShiftHours,
      videoTimeShiftHours: request.videoTimeShiftHours,
    });
    warnings.push(...tagged.warnings);
    failures.push(...tagged.failures);
    return finish(tagged.geotagged, tagged.untagged);
  }

  async geotagDirectory(
    directory: string,
    trackLogs: readonly string[],
    options: GeotagDirectoryOptions = {}
  ): Promise<GeotagDirectoryResult> {
    return this.geotagPaths([directory], trackLogs, options);
  }

  async geotagPaths(
    paths: readonly string[],
    trackLogs: readonly string[],
    options: GeotagDirectoryOptions = {}
  ): Promise<GeotagDirectoryResult> {
    const logger = this.logger.extend("geotag");
    const result: GeotagDirectoryResult = {
      geotagged: [],
      untagged: [],
      skipped: [],
      warnings: [],
      failures: [],
    };

    const expanded: string[] = [];
    for (const target of paths) {
      const files = await this.expand(target, options.pattern);
      if (isErr(files)) {
        logger.error({ error: files.error })`無法展開 ${target}`;
        result.failures.push({ stage: "scan", filePath: target, ...files.error });
        continue;
      }
      expanded.push(...files.value);
    }

    let files = [...new Set(expanded)];
    if (options.skipTagged) {
      const pending: string[] = [];
      for (const file of files) {
        const coords = await this.readCoordinates(file);
        if (isErr(coords)) {
          result.failures.push({ stage: "geotag", ...coords.error });
        } else if (coords.value) {
          result.skipped.push(file);
        } else {
          pending.push(file);
        }
      }
      files = pending;
    }

    const images = files.filter((f) => kindOf(f) === "image");
    const videos = files.filter((f) => kindOf(f) === "video");
    logger.info({ emoji: "🗺️" })`影像 ${images.length} 個、影片 ${videos.length} 個待 geotag`;

    if (images.length > 0) {
      // 影像時間本來就是當地時間，auto 不需偏移
      const shift = options.timeShiftHours ?? 0;
      const tagged = await this.metadataTool.geotag(
        images,
        trackLogs,
        shift === "auto" ? 0 : shift
      );
      if (isErr(tagged)) {
        logger.error({ error: tagged.error })`GPS 軌跡無法使用，停止 geotag`;
        result.failures.push({ stage: "geotag", ...tagged.error });
        return result;
      }
      const failed = new Set<string>();
      for (const failure of tagged.value.failures) {
        logger.error({ error: failure })`影像 geotag 失敗 ${failure.filePath}`;
        failed.add(failure.filePath);
        result.failures.push({ stage: "geotag", ...failure });
      }
      for (const image of images) {
        if (failed.has(image)) continue;
        const coords = await this.readCoordinates(image);
        if (isErr(coords)) {
          result.failures.push({ stage: "geotag", ...coords.error });
        } else if (coords.value) {
          result.geotagged.push(image);
        } else {
          logger.warn({ image })`軌跡範圍內找不到座標 ${image}`;
          result.untagged.push(image);
        }
      }
    }

    for (const video of videos) {
      const tagged = await this.pipeline.geotagVideo(video, trackLogs, {
        timeShiftHours: options.timeShiftHours,
        videoTimeShiftHours: options.videoTimeShiftHours,
      });
      if (isErr(tagged)) {
        logger.error({ error: tagged.error })`影片 geotag 失敗 ${video}`;
        result.failures.push({ stage: "geotag", ...tagged.error });
        continue;
      }
      result.warnings.push(...tagged.value.warnings);
      if (tagged.value.coordinateSource === "placeholder") {
        result.untagged.push(video);
      } else {
        logger.info({ emoji: "📍" })`${path.basename(video)} → ${tagged.value.coordinates}`;
        result.geotagged.push(video);
      }
    }

    logger.info({
      emoji: "✅",
      geotagged: result.geotagged.length,
      untagged: result.untagged.length,
    })`geotag 完成`;
    return result;
  }

  /** 資料夾展開為其中的影像與影片，檔案原樣保留 */
  private async expand(
    target: string,
    pattern: string | undefined
  ): Promise<Result<string[], ScanError>> {
    if (await isDirectory(target)) {
      return this.scanner.scan(target, { kinds: ["image", "video"], pattern });
    }
    if (!(await exists(target))) {
      return err({ type: "SCAN_FAILED", message: `找不到檔案: ${target}` });
    }
    if (kindOf(target) === undefined) {
      return err({ type: "SCAN_FAILED", message: `不支援的檔案類型: ${target}` });
    }
    return ok([target]);
  }

  private async readCoordinates(
    filePath: string
  ): Promise<Result<string | undefined, ToolInvocationError>> {
    // 影片的 GPSLatitude 由 GPSCoordinates 推得，兩種檔案都讀這個
    return this.metadataTool.readTag(filePath, "GPSLatitude");
  }
}
