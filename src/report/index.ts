/**
 * Report module.
 * Turns a finished run into the JSON contract and a Markdown transcript.
 */

export { generateJSON, generateMarkdown, serializeJSON } from './reporter.js';
export type { JsonOutput, JsonOutputMessage } from './reporter.js';
