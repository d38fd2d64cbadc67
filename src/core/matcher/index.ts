export { matchesFilter, compileFilter, MATCH_ALL } from './tag-matcher.js';
