export { sha256, hashParts, normalizeText } from './hasher.js';
