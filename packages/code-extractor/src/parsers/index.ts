export {
  CodeRecordParser,
  cleanResponseText,
  type ParseOutcome,
} from './code-record-parser';
