export * from "./MetadataTool";
export { MetadataToolExifTool } from "./MetadataToolExifTool";
