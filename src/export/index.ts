export {
  renderMarkdown,
  generateFilename,
  generateFrontmatter,
  formatMessage,
  imageLink,
  writeMarkdownFile,
  type MarkdownOptions,
  type WriteMarkdownResult,
} from './markdown.js';

export {
  csvField,
  csvRow,
  csvTimestamp,
  conversationRow,
  searchResultRow,
  messageRows,
  conversationsToCsv,
  searchResultsToCsv,
  messagesToCsv,
  CONVERSATION_COLUMNS,
  SEARCH_RESULT_COLUMNS,
  MESSAGE_COLUMNS,
  type CsvValue,
} from './csv.js';
