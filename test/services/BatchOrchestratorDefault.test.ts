import { rm } from "node:fs/promises";
import { join, resolve } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { parseBatchActions } from "@/services/BatchOrchestrator";
import { BatchOrchestratorDefault } from "@/services/BatchOrchestratorDefault";
import { FileCorrelatorDefault } from "@/services/FileCorrelatorDefault";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { GeotagPipelineDefault } from "@/services/GeotagPipelineDefault";
import { TimestampBridgeDefault } from "@/services/TimestampBridgeDefault";
import { exists } from "@/utils/helper";

import { MetadataToolFake } from "~test/fakes/MetadataToolFake";

const tmpDir = "test/tmp/batch";
const dir = join(tmpDir, "videos");
const trackLog = join(tmpDir, "logs", "day1.json");
const trackLog2 = join(tmpDir, "logs", "day2.json");
const outputDir = resolve(dir, "000hevc");

function setup() {
  const logger = buildTestLogger();
  const metadataTool = new MetadataToolFake();
  const scanner = new FileSystemScannerDefault();
  const orchestrator = new BatchOrchestratorDefault({
    scanner,
    correlator: new FileCorrelatorDefault({ scanner, logger }),
    bridge: new TimestampBridgeDefault({ metadataTool, logger }),
    pipeline: new GeotagPipelineDefault({ metadataTool, logger }),
    metadataTool,
    logger,
  });
  return { metadataTool, orchestrator };
}

describe("BatchOrchestratorDefault.run", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await MetadataToolFake.createTrackLog(trackLog, [
      { time: "2023-06-01T19:59:00Z", lat: 25.033, lon: 121.5654, alt: 10 },
      { time: "2023-06-01T20:10:00Z", lat: 25.1, lon: 121.6, alt: 20 },
    ]);
  });

  test("配對、搬移、補時間並 geotag", async () => {
    await MetadataToolFake.createFile(join(dir, "DSCFA.MOV"), {
      CreateDate: "2023:06:01 20:00:00",
    });
    await MetadataToolFake.createFile(join(dir, "DSCFA-1.mov"), {
      Encoder: "hevc",
    });
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.run({
      directory: dir,
      outputDir: "000hevc",
      trackLogs: [trackLog],
    });

    const target = join(outputDir, "DSCFA.mov");
    expect(result).toEqual({
      ok: true,
      moved: [{ from: join(dir, "DSCFA-1.mov"), to: target }],
      geotagged: [target],
      untagged: [],
      warnings: [],
      failures: [],
    });
    expect(await metadataTool.peek(target)).toEqual({
      Encoder: "hevc",
      CreateDate: "2023:06:01 20:00:00",
      Make: "FUJIFILM",
      Model: "X-T30",
      GPSLatitude: "25.033",
      GPSLongitude: "121.5654",
      GPSAltitude: "10",
      GPSAltitudeRef: "Above Sea Level",
      GPSCoordinates: "25.033, 121.5654, 10",
    });
    expect(await exists(join(dir, "DSCFA-1.mov"))).toBe(false);
    expect(await metadataTool.peek(join(dir, "DSCFA.MOV"))).toEqual({
      CreateDate: "2023:06:01 20:00:00",
    });
  });

  test("缺原始檔只產生警告，不算失敗", async () => {
    await MetadataToolFake.createFile(join(dir, "DSCFB-1.mov"));
    const { orchestrator } = setup();

    const result = await orchestrator.run({
      directory: dir,
      outputDir: "000hevc",
      trackLogs: [trackLog],
    });

    expect(result.ok).toBe(true);
    expect(result.moved).toEqual([]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({
      type: "PAIRING_WARNING",
      reason: "MISSING_ORIGINAL",
      filePath: join(dir, "DSCFB-1.mov"),
    });
    expect(await exists(join(dir, "DSCFB-1.mov"))).toBe(true);
  });

  test("輸出檔已存在時不覆蓋", async () => {
    await MetadataToolFake.createFile(join(dir, "DSCFA.MOV"), {
      CreateDate: "2023:06:01 20:00:00",
    });
    await MetadataToolFake.createFile(join(dir, "DSCFA-1.mov"), {
      Encoder: "hevc",
    });
    await MetadataToolFake.createFile(join(outputDir, "DSCFA.mov"), {
      Encoder: "old",
    });
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.run({
      directory: dir,
      outputDir: "000hevc",
      trackLogs: [],
    });

    expect(result.ok).toBe(false);
    expect(result.moved).toEqual([]);
    expect(result.failures).toEqual([
      {
        stage: "move",
        type: "TARGET_EXISTS",
        filePath: join(dir, "DSCFA-1.mov"),
        message: `目標已存在: ${join(outputDir, "DSCFA.mov")}`,
      },
    ]);
    expect(await metadataTool.peek(join(outputDir, "DSCFA.mov"))).toEqual({
      Encoder: "old",
    });
    expect(await exists(join(dir, "DSCFA-1.mov"))).toBe(true);
  });

  test("沒有軌跡時略過 geotag", async () => {
    await MetadataToolFake.createFile(join(dir, "DSCFA.MOV"), {
      CreateDate: "2023:06:01 20:00:00",
    });
    await MetadataToolFake.createFile(join(dir, "DSCFA-1.mov"));
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.run({
      directory: dir,
      outputDir: "000hevc",
      trackLogs: [],
    });

    expect(result.ok).toBe(true);
    expect(result.moved).toHaveLength(1);
    expect(result.geotagged).toEqual([]);
    expect(metadataTool.calls.some((c) => c.method === "geotag")).toBe(false);
  });

  test("原始檔沒有時間時記錄失敗，其餘照常", async () => {
    await MetadataToolFake.createFile(join(dir, "DSCFA.MOV"), {
      Make: "FUJIFILM",
    });
    await MetadataToolFake.createFile(join(dir, "DSCFA-1.mov"));
    await MetadataToolFake.createFile(join(dir, "DSCFC.MOV"), {
      CreateDate: "2023:06:01 20:00:00",
    });
    await MetadataToolFake.createFile(join(dir, "DSCFC-1.mov"));
    const { orchestrator } = setup();

    const result = await orchestrator.run({
      directory: dir,
      outputDir: "000hevc",
      trackLogs: [],
    });

    expect(result.ok).toBe(false);
    expect(result.moved.map((m) => m.to)).toEqual([
      join(outputDir, "DSCFA.mov"),
      join(outputDir, "DSCFC.mov"),
    ]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({
      stage: "copy-time",
      type: "NO_CREATION_TIME",
      filePath: join(dir, "DSCFA.MOV"),
    });
  });

  test("只執行 copy-time 時不做 geotag", async () => {
    await MetadataToolFake.createFile(join(dir, "DSCFA.MOV"), {
      CreateDate: "2023:06:01 20:00:00",
    });
    await MetadataToolFake.createFile(join(dir, "DSCFA-1.mov"));
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.run({
      directory: dir,
      outputDir: "000hevc",
      trackLogs: [trackLog],
      actions: ["copy-time"],
    });

    expect(result.ok).toBe(true);
    expect(result.geotagged).toEqual([]);
    expect(metadataTool.calls.some((c) => c.method === "geotag")).toBe(false);
    expect(await metadataTool.peek(join(outputDir, "DSCFA.mov"))).toEqual({
      CreateDate: "2023:06:01 20:00:00",
      Make: "FUJIFILM",
      Model: "X-T30",
    });
  });

  test("只執行 geotag 時搬移後不複製時間", async () => {
    await MetadataToolFake.createFile(join(dir, "DSCFA.MOV"), {
      CreateDate: "2023:06:01 23:00:00",
      Make: "FUJIFILM",
    });
    await MetadataToolFake.createFile(join(dir, "DSCFA-1.mov"), {
      CreateDate: "2023:06:01 20:00:00",
    });
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.run({
      directory: dir,
      outputDir: "000hevc",
      trackLogs: [trackLog],
      actions: ["geotag"],
    });

    const target = join(outputDir, "DSCFA.mov");
    expect(result.ok).toBe(true);
    expect(result.geotagged).toEqual([target]);
    expect(await metadataTool.peek(target)).toEqual({
      CreateDate: "2023:06:01 20:00:00",
      GPSLatitude: "25.033",
      GPSLongitude: "121.5654",
      GPSAltitude: "10",
      GPSAltitudeRef: "Above Sea Level",
      GPSCoordinates: "25.033, 121.5654, 10",
    });
  });

  test("軌跡檔不存在時記錄失敗，影片不寫入預設座標", async () => {
    await MetadataToolFake.createFile(join(dir, "DSCFA.MOV"), {
      CreateDate: "2023:06:01 20:00:00",
    });
    await MetadataToolFake.createFile(join(dir, "DSCFA-1.mov"));
    const missing = join(tmpDir, "logs", "missing.json");
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.run({
      directory: dir,
      outputDir: "000hevc",
      trackLogs: [missing],
    });

    const target = join(outputDir, "DSCFA.mov");
    expect(result.ok).toBe(false);
    expect(result.geotagged).toEqual([]);
    expect(result.untagged).toEqual([]);
    expect(result.failures).toEqual([
      {
        stage: "geotag",
        type: "TOOL_INVOCATION_FAILED",
        filePath: missing,
        message: `Error opening GPS file '${missing}'`,
      },
    ]);
    expect((await metadataTool.peek(target)).GPSCoordinates).toBeUndefined();
  });

  test("資料夾不存在時整批失敗", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.run({
      directory: join(tmpDir, "missing"),
      outputDir: "000hevc",
      trackLogs: [trackLog],
    });

    expect(result.ok).toBe(false);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.stage).toBe("scan");
    expect(result.failures[0]?.type).toBe("SCAN_FAILED");
    expect(await exists(join(tmpDir, "missing"))).toBe(false);
  });
});

describe("BatchOrchestratorDefault.geotagDirectory", () => {
  const photos = join(tmpDir, "photos");

  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await MetadataToolFake.createTrackLog(trackLog, [
      { time: "2023-06-01T20:00:00Z", lat: 25.033, lon: 121.5654, alt: 10 },
    ]);
    await MetadataToolFake.createTrackLog(trackLog2, [
      { time: "2023-06-02T08:00:00Z", lat: 24.1, lon: 120.6, alt: 30 },
    ]);
    await MetadataToolFake.createFile(join(photos, "IMG1.jpg"), {
      DateTimeOriginal: "2023:06:01 20:00:00",
    });
    await MetadataToolFake.createFile(join(photos, "IMG2.jpg"), {
      DateTimeOriginal: "2023:06:02 08:10:00",
    });
    await MetadataToolFake.createFile(join(photos, "IMG3.jpg"), {
      DateTimeOriginal: "2023:07:01 00:00:00",
    });
  });

  test("影像一次呼叫 geotag，範圍外的列為 untagged", async () => {
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.geotagDirectory(photos, [
      trackLog,
      trackLog2,
    ]);

    expect(result.geotagged).toEqual([
      join(photos, "IMG1.jpg"),
      join(photos, "IMG2.jpg"),
    ]);
    expect(result.untagged).toEqual([join(photos, "IMG3.jpg")]);
    expect(result.failures).toEqual([]);
    expect(
      metadataTool.calls.filter((c) => c.method === "geotag")
    ).toHaveLength(1);
    expect((await metadataTool.peek(join(photos, "IMG2.jpg"))).GPSLatitude).toBe(
      "24.1"
    );
    expect(
      (await metadataTool.peek(join(photos, "IMG3.jpg"))).GPSLatitude
    ).toBeUndefined();
  });

  test("skipTagged 略過已有座標的檔案", async () => {
    await MetadataToolFake.createFile(join(photos, "IMG1.jpg"), {
      DateTimeOriginal: "2023:06:01 20:00:00",
      GPSLatitude: "1",
    });
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.geotagDirectory(
      photos,
      [trackLog, trackLog2],
      { skipTagged: true }
    );

    expect(result.skipped).toEqual([join(photos, "IMG1.jpg")]);
    expect(result.geotagged).toEqual([join(photos, "IMG2.jpg")]);
    const geotagCall = metadataTool.calls.find((c) => c.method === "geotag");
    expect(geotagCall?.paths).toEqual([
      join(photos, "IMG2.jpg"),
      join(photos, "IMG3.jpg"),
    ]);
    expect((await metadataTool.peek(join(photos, "IMG1.jpg"))).GPSLatitude).toBe(
      "1"
    );
  });

  test("影像與影片混合時影片走 companion 流程", async () => {
    await MetadataToolFake.createFile(join(photos, "DSCF0009.mov"), {
      CreateDate: "2023:06:01 20:05:00",
    });
    const { orchestrator } = setup();

    const result = await orchestrator.geotagDirectory(photos, [trackLog]);

    expect(result.geotagged).toEqual([
      join(photos, "IMG1.jpg"),
      join(photos, "DSCF0009.mov"),
    ]);
    expect(result.untagged).toEqual([
      join(photos, "IMG2.jpg"),
      join(photos, "IMG3.jpg"),
    ]);
    expect(await exists(join(photos, "DSCF0009_geotag_tmp.xmp"))).toBe(false);
  });

  test("影片沒有座標時列為 untagged 並帶警告", async () => {
    await MetadataToolFake.createFile(join(photos, "DSCF0010.mov"), {
      CreateDate: "2024:01:01 00:00:00",
    });
    const { orchestrator } = setup();

    const result = await orchestrator.geotagDirectory(photos, [trackLog]);

    expect(result.untagged).toContain(join(photos, "DSCF0010.mov"));
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.filePath).toBe(join(photos, "DSCF0010.mov"));
    expect(result.failures).toEqual([]);
  });

  test("多個影像寫入失敗時逐一記錄，其餘照常判斷", async () => {
    const { metadataTool, orchestrator } = setup();
    metadataTool.failWritesOn(join(photos, "IMG1.jpg"));
    metadataTool.failWritesOn(join(photos, "IMG2.jpg"));

    const result = await orchestrator.geotagDirectory(photos, [
      trackLog,
      trackLog2,
    ]);

    expect(result.failures).toEqual([
      {
        stage: "geotag",
        type: "TOOL_INVOCATION_FAILED",
        filePath: join(photos, "IMG1.jpg"),
        message: "模擬寫入失敗",
      },
      {
        stage: "geotag",
        type: "TOOL_INVOCATION_FAILED",
        filePath: join(photos, "IMG2.jpg"),
        message: "模擬寫入失敗",
      },
    ]);
    expect(result.geotagged).toEqual([]);
    expect(result.untagged).toEqual([join(photos, "IMG3.jpg")]);
  });

  test("軌跡檔不存在時整批失敗，影片不寫入預設座標", async () => {
    await MetadataToolFake.createFile(join(photos, "DSCF0009.mov"), {
      CreateDate: "2023:06:01 20:05:00",
    });
    const missing = join(tmpDir, "logs", "missing.json");
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.geotagDirectory(photos, [missing]);

    expect(result.failures).toEqual([
      {
        stage: "geotag",
        type: "TOOL_INVOCATION_FAILED",
        filePath: missing,
        message: `Error opening GPS file '${missing}'`,
      },
    ]);
    expect(result.geotagged).toEqual([]);
    expect(result.untagged).toEqual([]);
    expect(await metadataTool.peek(join(photos, "DSCF0009.mov"))).toEqual({
      CreateDate: "2023:06:01 20:05:00",
    });
  });

  test("geotagPaths 接受檔案與資料夾，資料夾依 pattern 展開", async () => {
    const extra = join(tmpDir, "extra");
    await MetadataToolFake.createFile(join(extra, "A.JPG"), {
      DateTimeOriginal: "2023:06:01 20:10:00",
    });
    await MetadataToolFake.createFile(join(extra, "DSCF0100.mov"), {
      CreateDate: "2023:06:01 20:00:00",
    });
    const { metadataTool, orchestrator } = setup();

    const result = await orchestrator.geotagPaths(
      [join(photos, "IMG1.jpg"), extra],
      [trackLog],
      { pattern: "*.jpg" }
    );

    expect(result.geotagged).toEqual([
      join(photos, "IMG1.jpg"),
      join(extra, "A.JPG"),
    ]);
    expect(result.failures).toEqual([]);
    const geotagCall = metadataTool.calls.find((c) => c.method === "geotag");
    expect(geotagCall?.paths).toEqual([
      join(photos, "IMG1.jpg"),
      join(extra, "A.JPG"),
    ]);
    expect(
      (await metadataTool.peek(join(extra, "DSCF0100.mov"))).GPSCoordinates
    ).toBeUndefined();
  });

  test("geotagPaths 找不到的路徑記為失敗，其餘照常", async () => {
    const missing = join(photos, "IMG9.jpg");
    const { orchestrator } = setup();

    const result = await orchestrator.geotagPaths(
      [missing, join(photos, "IMG1.jpg")],
      [trackLog]
    );

    expect(result.failures).toEqual([
      {
        stage: "scan",
        type: "SCAN_FAILED",
        filePath: missing,
        message: `找不到檔案: ${missing}`,
      },
    ]);
    expect(result.geotagged).toEqual([join(photos, "IMG1.jpg")]);
  });

  test("影像的 auto 偏移為 0", async () => {
    const { metadataTool, orchestrator } = setup();

    await orchestrator.geotagDirectory(photos, [trackLog], {
      timeShiftHours: "auto",
    });

    const geotagCall = metadataTool.calls.find((c) => c.method === "geotag");
    expect(geotagCall).toMatchObject({ method: "geotag", timeShiftHours: 0 });
  });
});

describe("parseBatchActions", () => {
  test("未指定時回傳 undefined", () => {
    expect(parseBatchActions([])).toEqual({ ok: true, value: undefined });
  });

  test("接受重複指定與逗號分隔，並去除重複", () => {
    expect(parseBatchActions(["geotag", "copy-time, geotag"])).toEqual({
      ok: true,
      value: ["geotag", "copy-time"],
    });
  });

  test("不認得的步驟回傳錯誤", () => {
    expect(parseBatchActions(["convert"])).toEqual({
      ok: false,
      error: "--action 只接受 copy-time, geotag，收到: convert",
    });
  });
});
