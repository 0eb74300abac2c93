// src/index.ts
export * from "./otbm/constants.js";
export * from "./otbm/errors.js";
export * from "./otbm/model.js";
export * from "./otbm/limits.js";
export * from "./otbm/report.js";
export * from "./otbm/context.js";
export * from "./otbm/text.js";
export { escapeBytes, unescapeBytes, escapedLength, EscapedCursor } from "./otbm/escape.js";
export { BinaryReader, BinaryWriter } from "./otbm/binary.js";
export type { ByteSource } from "./otbm/byteSource.js";
export { BufferByteSource, FileByteSource, FILE_WINDOW_BYTES } from "./otbm/byteSource.js";
export type { NodeEvent, NodeOpenEvent, NodeCloseEvent, NodeReaderOptions } from "./otbm/nodeReader.js";
export { NodePayload, NodeReader } from "./otbm/nodeReader.js";
export type { ByteSink } from "./otbm/nodeWriter.js";
export { BufferSink, FileSink, NodeWriter } from "./otbm/nodeWriter.js";
export * from "./otbm/itemDatabase.js";
export * from "./otbm/idTranslator.js";
export * from "./otbm/formatVersion.js";
export * from "./otbm/project.js";
export * from "./otbm/workspace.js";
export { attributeMapValue } from "./otbm/itemCodec.js";
export * from "./otbm/mapDetection.js";
export * from "./otbm/mapLoader.js";
export * from "./otbm/mapSaver.js";
export * from "./otbm/atomicFile.js";
export * from "./otbm/mapValidator.js";
export * from "./otbm/mapJsonV1.js";
export * from "./otbm/convertTool.js";
