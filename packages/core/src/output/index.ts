export {
  type OutputFormat,
  type WriteReportOptions,
  type WriteReportResult,
  resolveFilename,
  renderCouncilReport,
  writeCouncilReport,
} from './writer.js';

export {
  formatCouncilMarkdown,
  formatDuration,
  type MarkdownFormatOptions,
} from './markdown.js';

export {
  formatCouncilJson,
  parseCouncilReport,
  type JsonFormatOptions,
  type JsonOutput,
  type JsonOutputMetadata,
} from './json.js';
