export {
    SecurityResolver,
    secIdElement,
    securityEntry,
    cashSecIdElement,
    cashSecurityEntry,
} from './resolver.js';
export type {
    SecurityClassifier,
    SecurityKind,
    UniqueIdType,
    ResolvedSecurity,
    SecurityEntry,
} from './types.js';
