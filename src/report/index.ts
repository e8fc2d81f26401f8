// Run output: the versioned JSON record and the markdown transcript. No oracle calls.

export { generateMarkdown, generateJSON, serializeJSON } from './reporter.js';
export type { JsonOutput, JsonOutputStep, JsonOutputRecord } from './reporter.js';
