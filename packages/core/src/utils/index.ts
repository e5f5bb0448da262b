export {
    normalizeCurrency,
    normalizeQuantity,
    normalizeHeader,
    computePrice,
    isNumeric,
    escapeMarkup,
} from './normalize.js';
export {
    parseBrokerageDate,
    parseMdyDate,
    parseIsoDate,
    formatOfxDate,
    formatDocumentTimestamp,
    formatServerTimestamp,
    addDays,
} from './date-parse.js';
export { stripBom, isEmptyRow } from './csv.js';
