/**
 * TTKIA SDK
 *
 * Typed client for the TTKIA assistant API.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createTTKIAClient, loadConfigFromEnv, loadDotenv } from 'ttkia-sdk';
 *
 * loadDotenv();
 * const client = createTTKIAClient(loadConfigFromEnv());
 *
 * const { conversation_id } = await client.newWorkspace();
 * await client.uploadFile('./notes.txt');
 * const answer = await client.query('What is SD-WAN?', {
 *   teacherMode: true,
 *   webSearch: true,
 * });
 * console.log(answer.response_text, answer.confidence);
 *
 * await client.deleteConversation(conversation_id);
 * ```
 *
 * @module ttkia-sdk
 */

export { createTTKIAClient, ENDPOINTS, QUERY_DEFAULTS } from "./core/client";
export {
  createConfig,
  validateConfig,
  loadConfigFromEnv,
  loadDotenv,
  DEFAULT_CLIENT_CONFIG,
} from "./core/config";
export { createHttpClient, buildUrl } from "./core/http-client";
export { createLogger, parseLogLevel, LOG_LEVELS } from "./core/logger";
export { getContentType } from "./core/mime";
export * from "./core/errors";

// Types - Re-export all types for convenience
export * from "./types";
