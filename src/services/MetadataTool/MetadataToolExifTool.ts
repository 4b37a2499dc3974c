import { ExifTool } from "exiftool-vendored";
import { access } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { TagValues, ToolInvocationError } from "@/types";

import {
  assignmentArgs,
  commonWriteArgs,
  copyArgs,
  createArgs,
  geotagArgs,
  isGpsFileError,
  isNoFixMessage,
  shiftArgs,
} from "./ExifArgs";
import { tagValueToString } from "./ExifDateTimeHelper";
import type {
  GeotagReport,
  MetadataTool,
  WriteTagsOptions,
} from "./MetadataTool";

export class MetadataToolExifTool implements MetadataTool {
  private readonly exiftool: ExifTool;
  private readonly logger: Logger;

  constructor(deps: { logger: Logger; taskTimeoutMillis: number }) {
    this.logger = deps.logger.extend("exiftool");
    this.exiftool = new ExifTool({
      maxProcs: 1,
      taskTimeoutMillis: deps.taskTimeoutMillis,
    });
  }

  async readTags(
    filePath: string,
    tagNames: readonly string[]
  ): Promise<Result<TagValues, ToolInvocationError>> {
    try {
      const tags = await this.exiftool.read(filePath);
      if (tags.errors && tags.errors.length > 0) {
        return err(toolError(filePath, tags.errors.join("; ")));
      }
      const entries = new Map<string, unknown>(Object.entries(tags));
      const values: TagValues = {};
      for (const name of tagNames) {
        const value = tagValueToString(entries.get(name));
        if (value !== undefined) values[name] = value;
      }
      return ok(values);
    } catch (error) {
      return err(toolError(filePath, error));
    }
  }

  async readTag(
    filePath: string,
    tagName: string
  ): Promise<Result<string | undefined, ToolInvocationError>> {
    const result = await this.readTags(filePath, [tagName]);
    if (!result.ok) return result;
    return ok(result.value[tagName]);
  }

  async writeTags(
    filePath: string,
    tags: TagValues,
    options?: WriteTagsOptions
  ): Promise<Result<void, ToolInvocationError>> {
    if (options?.createFrom) {
      // -o 會由來源另存新檔，不能同時帶 -overwrite_original
      return this.runVoid(
        options.createFrom,
        [...createArgs(filePath), ...assignmentArgs(tags)],
        { overwrite: false, reportAs: filePath }
      );
    }
    return this.runVoid(filePath, assignmentArgs(tags));
  }

  async copyTags(
    sourcePath: string,
    targetPath: string,
    tagNames: readonly string[]
  ): Promise<Result<void, ToolInvocationError>> {
    return this.runVoid(targetPath, copyArgs(sourcePath, tagNames));
  }

  async shiftTags(
    filePath: string,
    tagNames: readonly string[],
    hours: number
  ): Promise<Result<void, ToolInvocationError>> {
    const args = shiftArgs(tagNames, hours);
    if (args.length === 0) return ok();
    return this.runVoid(filePath, args);
  }

  async geotag(
    targets: readonly string[],
    trackLogs: readonly string[],
    timeShiftHours: number
  ): Promise<Result<GeotagReport, ToolInvocationError>> {
    for (const log of trackLogs) {
      try {
        await access(log);
      } catch (error) {
        return err(toolError(log, `找不到 GPS 軌跡檔: ${errorMessage(error)}`));
      }
    }
    const args = geotagArgs(trackLogs, timeShiftHours);
    const report: GeotagReport = { failures: [], noFix: [] };
    for (const target of targets) {
      const result = await this.run(target, args);
      const messages = result.ok ? result.value : [result.error.message];
      const gpsFileError = messages.find(isGpsFileError);
      if (gpsFileError) {
        return err(toolError(trackLogs.join(", "), gpsFileError));
      }
      if (messages.some(isNoFixMessage)) {
        this.logger.debug({ target, messages })`軌跡範圍內沒有對應點 ${target}`;
        report.noFix.push(target);
        continue;
      }
      if (!result.ok) report.failures.push(result.error);
    }
    return ok(report);
  }

  async [Symbol.asyncDispose]() {
    await this.exiftool.end();
  }

  private async runVoid(
    filePath: string,
    args: string[],
    options: { overwrite?: boolean; reportAs?: string } = {}
  ): Promise<Result<void, ToolInvocationError>> {
    const result = await this.run(filePath, args, options);
    return result.ok ? ok() : result;
  }

  /** 成功時回傳 exiftool 的警告訊息 */
  private async run(
    filePath: string,
    args: string[],
    options: { overwrite?: boolean; reportAs?: string } = {}
  ): Promise<Result<string[], ToolInvocationError>> {
    const writeArgs =
      options.overwrite === false
        ? [...commonWriteArgs.slice(1), ...args]
        : [...commonWriteArgs, ...args];
    this.logger.trace({ filePath, writeArgs })`exiftool ${writeArgs.join(" ")} ${filePath}`;
    try {
      const result = await this.exiftool.write(filePath, {}, { writeArgs });
      const warnings = result.warnings ?? [];
      if (warnings.length > 0) {
        this.logger.debug({ filePath, warnings })`exiftool 警告 ${filePath}`;
      }
      return ok(warnings);
    } catch (error) {
      return err(toolError(options.reportAs ?? filePath, error));
    }
  }
}

function toolError(filePath: string, error: unknown): ToolInvocationError {
  return {
    type: "TOOL_INVOCATION_FAILED",
    filePath,
    message: errorMessage(error),
  };
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
