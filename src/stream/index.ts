export {
  decodeJsonArray,
  JsonArrayScanner,
  type RawRecord,
  type DecodedRecord,
  type MalformedRecord,
  type Chunk,
} from './decoder.js';

export {
  openSource,
  readRecords,
  describeSource,
  type ExportSource,
  type SourceFactory,
} from './source.js';

export { isZipFile, readConversationsEntry, CONVERSATIONS_ENTRY } from './zip.js';
