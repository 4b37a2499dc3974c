import { readFile, rm } from "node:fs/promises";
import { describe, expect, test } from "vitest";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { buildTestLogger } from "~shared/testkit/TestLogger";

const tmpDir = "test/tmp/dump";

describe("DumpWriterDefault", () => {
  test("以時間戳與清理過的名稱輸出 JSON", async () => {
    await rm(tmpDir, { recursive: true, force: true });
    const writer = new DumpWriterDefault(
      buildTestLogger(),
      tmpDir,
      () => new Date(2024, 0, 2, 3, 4, 5)
    );

    const filePath = await writer.dump("geotag 報告/A", { count: 1 });

    expect(filePath).toBe(`${tmpDir}/20240102-030405-geotag_報告_A.json`);
    const text = await readFile(filePath, "utf8");
    expect(JSON.parse(text)).toEqual({ count: 1 });
  });
});
