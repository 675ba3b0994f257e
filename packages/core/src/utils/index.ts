export { humanizeFieldName } from './records.js';
export { parseIsoTimestamp, parseDateText, parseTimestamp, formatTimestamp, isTimestampString } from './timestamps.js';
