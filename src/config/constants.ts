import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'page-distill';
export const APP_VERSION = PACKAGE_VERSION;

export const USER_AGENT = `${APP_NAME}/${APP_VERSION}`;

export const DEFAULT_CHUNK_MAX_LENGTH = 6000;

export const MAX_REDIRECTIONS = 3;

/** Elements whose text never reaches the reader. */
export const NON_VISIBLE_SELECTORS = 'script, style, noscript, template';

export const PROMPT_PLACEHOLDERS = {
  CONTENT: '{content}',
  INSTRUCTION: '{instruction}',
} as const;

export const EXTRACTION_PROMPT_TEMPLATE =
  'You are tasked with extracting specific information from the following text content: {content}. ' +
  'Please follow these instructions carefully:\n\n' +
  '1. **Extract Information:** Only extract the information that directly matches the provided description: {instruction}. ' +
  '2. **No Extra Content:** Do not include any additional text, comments, or explanations in your response. ' +
  "3. **Empty Response:** If no information matches the description, return an empty string (''). " +
  '4. **Direct Data Only:** Your output should contain only the data that is explicitly requested, with no other text.';

export const BATCH_BANNER_WIDTH = 80;
