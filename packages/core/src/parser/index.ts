export { parseBrokerageExport, findHeaderRow } from './brokerage.js';
export { parseEquityTickers } from './equities.js';
