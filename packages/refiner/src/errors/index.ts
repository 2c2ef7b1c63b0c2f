export { ContractViolationError } from './contract-violation-error';
export { CorrectionTableError } from './correction-table-error';
