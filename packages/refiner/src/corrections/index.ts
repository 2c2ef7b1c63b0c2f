export {
  correctionEntrySchema,
  correctionTableSchema,
  loadBuiltinCorrectionTable,
  parseCorrectionTable,
} from './correction-table';
export { TermDictionary, transferCase } from './term-dictionary';
export type { SuggestOptions } from './term-dictionary';
