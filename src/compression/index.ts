/**
 * File type detection and decompression
 */

export {
  classify,
  fileTypeForParserName,
  fileTypesForExtension,
  isParserName,
  parserNameForFileType,
} from "./detector";
export { decompress, GZIP_CODECS, sniff, SNIFF_LENGTH } from "./decompress";
export type { Decompressed } from "./decompress";
export { GzipSource, gzipSource } from "./gzip";
export { CodecService, loadCodecsWithZstd } from "./service";
export type { CodecServiceShape } from "./service";
export { loadZstd, ZstdSource, zstdCodec } from "./zstd";
