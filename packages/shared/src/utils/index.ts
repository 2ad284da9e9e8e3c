export { normalizeName } from './normalize-name';
export { isMissing, cellsEqual, compositeKey } from './cells';
