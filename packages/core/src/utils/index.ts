export { normalize, ruleKey, slugify, compareText } from './normalize.js';
export { isUncategorized } from './sentinel.js';
