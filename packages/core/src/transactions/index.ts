export { classifyActivity, isFundingActivity, generateTransaction } from './classify.js';
export type { GenerateOptions } from './classify.js';
export { generateBuySell, deriveTradeValues } from './buy-sell.js';
export { generateFee, generateInterest } from './bank.js';
export { generateIncome } from './income.js';
export { generateTransfer, transferDirection } from './transfer.js';
export { buildFitId, settlementDateString, tradeDateString } from './fitid.js';
export type { GeneratedTransaction, TransactionContext, TransactionKind } from './types.js';
