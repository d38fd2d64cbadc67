export { isRegularFile, writeFileAtomic, errorMessage } from './fs.js';
export { relativeToBase } from './path.js';
export { zodToIssues } from './result.js';
