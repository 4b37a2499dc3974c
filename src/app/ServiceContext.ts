import type { Logger } from "~shared/Logger";

import { getAppConfig } from "@/config";
import { BatchOrchestratorDefault } from "@/services/BatchOrchestratorDefault";
import { FileCorrelatorDefault } from "@/services/FileCorrelatorDefault";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { GeotagPipelineDefault } from "@/services/GeotagPipelineDefault";
import { MetadataToolExifTool } from "@/services/MetadataTool";
import { TimestampBridgeDefault } from "@/services/TimestampBridgeDefault";

/** 各指令共用的服務組裝；呼叫端負責 dispose metadataTool */
export function buildServices(logger: Logger) {
  const config = getAppConfig();
  const metadataTool = new MetadataToolExifTool({
    logger,
    taskTimeoutMillis: config.MEDIA_FLOW_TASK_TIMEOUT_MS,
  });
  const scanner = new FileSystemScannerDefault();
  const bridge = new TimestampBridgeDefault({ metadataTool, logger });
  const pipeline = new GeotagPipelineDefault({ metadataTool, logger });
  const orchestrator = new BatchOrchestratorDefault({
    scanner,
    correlator: new FileCorrelatorDefault({ scanner, logger }),
    bridge,
    pipeline,
    metadataTool,
    logger,
  });
  return { config, metadataTool, bridge, pipeline, orchestrator };
}
