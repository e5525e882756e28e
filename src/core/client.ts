/**
 * TTKIA Assistant Client Implementation
 *
 * Wraps every TTKIA endpoint in one authenticated call and keeps track of the
 * current conversation.
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import type { z } from "zod";
import type {
  TTKIAClient,
  CreateClientOptions,
  QueryOptions,
  UploadBytes,
  UploadOptions,
  SessionInfo,
  Attachment,
  ConversationDetails,
  ConversationSummary,
  EnvironmentInfo,
  Option,
  QueryPayload,
  QueryResponse,
  Source,
  UploadResult,
  UserProfile,
  Workspace,
} from "../types";
import {
  ConversationDetailsSchema,
  EnvironmentInfoSchema,
  PromptsResponseSchema,
  QueryResponseSchema,
  SourcesResponseSchema,
  StylesResponseSchema,
  UploadResultSchema,
  UserProfileSchema,
  WorkspaceSchema,
} from "../types";
import { createConfig, validateConfig } from "./config";
import { AuthError, FileError, InvalidResponseError, ValidationError, errorMessage } from "./errors";
import { createHttpClient } from "./http-client";
import { createLogger, parseLogLevel } from "./logger";
import { getContentType } from "./mime";

export const ENDPOINTS = {
  env: "/env",
  newWorkspace: "/new-workspace",
  query: "/query_complete",
  styles: "/get_styles",
  prompts: "/get_prompts",
  sources: "/get_sources",
  upload: "/chat-upload",
  conversationInfo: "/conversation-info",
  forget: "/forget",
  me: "/auth/users/me",
} as const;

export const QUERY_DEFAULTS = {
  prompt: "default",
  style: "concise",
  title: "New Query",
} as const;

/**
 * Decode a response body, rejecting with InvalidResponseError on mismatch.
 */
function decode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  endpoint: string
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    throw new InvalidResponseError(endpoint, reason);
  }
  return result.data;
}

function requireText(value: string | undefined | null, field: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`${field} must be a non-empty string`, field);
  }
  return value;
}

/**
 * Create a new TTKIA assistant client.
 */
export function createTTKIAClient(options: CreateClientOptions): TTKIAClient {
  const config = createConfig(options);
  validateConfig(config);

  const logger = options.logger ?? createLogger(config.loggerName, config.logLevel);
  if (options.logger && options.logLevel !== undefined) {
    logger.setLevel(config.logLevel);
  }

  const http = createHttpClient(config.baseUrl, {
    headers: { Authorization: `Bearer ${config.appToken}` },
    timeoutMs: config.timeoutMs,
    logger,
  });

  // Internal state
  let initialized = false;
  let currentConversationId: string | null = null;

  logger.info(`TTKIA client created for ${config.baseUrl}`);

  function resolveConversationId(conversationId?: string): string {
    return requireText(conversationId ?? currentConversationId, "conversationId");
  }

  /** An explicit id must be non-empty; without one, the current conversation (if any) applies */
  function targetConversationId(conversationId?: string): string | null {
    return conversationId === undefined
      ? currentConversationId
      : requireText(conversationId, "conversationId");
  }

  async function fetchProfile(): Promise<UserProfile> {
    const body = await http.get(ENDPOINTS.me);
    return decode(UserProfileSchema, body, ENDPOINTS.me);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Session
  // ─────────────────────────────────────────────────────────────────────────────

  async function initialize(): Promise<EnvironmentInfo | null> {
    try {
      const body = await http.post(ENDPOINTS.env);
      const env = decode(EnvironmentInfoSchema, body ?? {}, ENDPOINTS.env);
      initialized = true;
      logger.info("Session initialized");
      return env;
    } catch (error) {
      logger.warn(`Could not initialize session: ${errorMessage(error)}`);
      return null;
    }
  }

  async function isAuthenticated(): Promise<boolean> {
    try {
      await fetchProfile();
      return true;
    } catch (error) {
      if (error instanceof AuthError) {
        logger.warn("Token is invalid or expired");
      } else {
        logger.error(`Authentication check failed: ${errorMessage(error)}`);
      }
      return false;
    }
  }

  async function getSessionInfo(): Promise<SessionInfo> {
    let authenticated = false;
    let username: string | null = null;

    try {
      const profile = await fetchProfile();
      authenticated = true;
      username = profile.username ?? null;
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      logger.warn("Token is invalid or expired");
    }

    return {
      authenticated,
      username,
      baseUrl: config.baseUrl,
      appTokenPresent: config.appToken.length > 0,
      timeoutMs: config.timeoutMs,
      currentConversationId,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Workspaces & Conversations
  // ─────────────────────────────────────────────────────────────────────────────

  async function newWorkspace(): Promise<Workspace> {
    const body = await http.post(ENDPOINTS.newWorkspace);
    const workspace = decode(WorkspaceSchema, body, ENDPOINTS.newWorkspace);

    currentConversationId = workspace.conversation_id;
    logger.info(`New workspace created: ${workspace.conversation_id}`);
    return workspace;
  }

  async function showConversation(conversationId?: string): Promise<ConversationDetails> {
    const id = resolveConversationId(conversationId);
    const body = await http.post(ENDPOINTS.conversationInfo, { conversation_id: id });
    const details = decode(ConversationDetailsSchema, body, ENDPOINTS.conversationInfo);

    logger.debug(`Fetched conversation ${id}`);
    return details;
  }

  async function switchConversation(conversationId: string): Promise<ConversationDetails> {
    const id = requireText(conversationId, "conversationId");
    const details = await showConversation(id);

    currentConversationId = id;
    logger.info(`Switched to conversation ${id}`);
    return details;
  }

  async function deleteConversation(conversationId: string): Promise<boolean> {
    const id = requireText(conversationId, "conversationId");
    await http.post(ENDPOINTS.forget, { conversation_id: id });

    if (currentConversationId === id) {
      currentConversationId = null;
    }
    logger.info(`Conversation deleted: ${id}`);
    return true;
  }

  async function getConversations(): Promise<ConversationSummary[]> {
    const profile = await fetchProfile();
    const conversations = profile.history_chat?.conversations ?? [];

    logger.info(`Fetched ${conversations.length} conversations`);
    return conversations;
  }

  async function getAttachments(conversationId?: string): Promise<Attachment[]> {
    const details = await showConversation(conversationId);
    const attachments = details.file_attachments;

    logger.info(`Fetched ${attachments.length} attachments`);
    return attachments;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Configuration Options
  // ─────────────────────────────────────────────────────────────────────────────

  async function getStyles(): Promise<Option[]> {
    const body = await http.get(ENDPOINTS.styles);
    const styles = decode(StylesResponseSchema, body, ENDPOINTS.styles);

    logger.info(`Fetched ${styles.length} styles`);
    return styles;
  }

  async function getPrompts(): Promise<Option[]> {
    const body = await http.get(ENDPOINTS.prompts);
    const prompts = decode(PromptsResponseSchema, body, ENDPOINTS.prompts);

    logger.info(`Fetched ${prompts.length} prompts`);
    return prompts;
  }

  async function getSources(): Promise<Source[]> {
    const body = await http.post(ENDPOINTS.sources);
    const sources = decode(SourcesResponseSchema, body, ENDPOINTS.sources);

    logger.info(`Fetched ${sources.length} sources`);
    return sources;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Query
  // ─────────────────────────────────────────────────────────────────────────────

  async function defaultSourceTitles(): Promise<string[]> {
    try {
      const sources = await getSources();
      const titles = sources
        .map((source) => source.title)
        .filter((title): title is string => Boolean(title));
      logger.debug(`Using ${titles.length} sources`);
      return titles;
    } catch (error) {
      logger.warn(`Could not fetch sources, querying without them: ${errorMessage(error)}`);
      return [];
    }
  }

  async function query(queryText: string, queryOptions: QueryOptions = {}): Promise<QueryResponse> {
    const text = requireText(queryText, "queryText");
    const conversationId = targetConversationId(queryOptions.conversationId);

    const payload: QueryPayload = {
      query: text,
      conversation_id: conversationId,
      prompt: queryOptions.prompt ?? QUERY_DEFAULTS.prompt,
      style: queryOptions.style ?? QUERY_DEFAULTS.style,
      teacher_mode: queryOptions.teacherMode ?? false,
      sources: queryOptions.sources ?? (await defaultSourceTitles()),
      attached_files: queryOptions.attachedFiles ?? [],
      attached_urls: queryOptions.attachedUrls ?? [],
      web_search: queryOptions.webSearch ?? false,
      title: queryOptions.title ?? QUERY_DEFAULTS.title,
    };

    logger.info(`Running query: '${text.slice(0, 50)}...'`);
    logger.debug(
      `Parameters: conversation_id=${conversationId}, prompt=${payload.prompt}, ` +
        `style=${payload.style}, teacher_mode=${payload.teacher_mode}, web_search=${payload.web_search}`
    );

    const body = await http.post(ENDPOINTS.query, payload);
    const response = decode(QueryResponseSchema, body, ENDPOINTS.query);

    if (
      conversationId &&
      response.conversation_id &&
      response.conversation_id !== conversationId
    ) {
      logger.warn(
        `Query sent to ${conversationId} was answered for ${response.conversation_id}`
      );
    }

    logger.info("Query completed");
    return response;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Attachments
  // ─────────────────────────────────────────────────────────────────────────────

  async function readUpload(
    input: string | UploadBytes,
    filename?: string
  ): Promise<{ data: Uint8Array; filename: string }> {
    if (typeof input !== "string") {
      return {
        data: input.data,
        filename: requireText(filename ?? input.filename, "filename"),
      };
    }

    const path = requireText(input, "filePath");
    try {
      const data = await readFile(path);
      return { data, filename: filename ?? basename(path) };
    } catch (error) {
      logger.error(`File not readable: ${path}`);
      throw new FileError(`Cannot read file ${path}: ${errorMessage(error)}`, path, error);
    }
  }

  async function uploadFile(
    input: string | UploadBytes,
    uploadOptions: UploadOptions = {}
  ): Promise<UploadResult> {
    const conversationId = targetConversationId(uploadOptions.conversationId);
    const file = await readUpload(input, uploadOptions.filename);
    const contentType = getContentType(file.filename);

    logger.info(`Uploading file: ${file.filename} (${file.data.byteLength} bytes)`);

    const form = new FormData();
    form.append(
      "file",
      new Blob([new Uint8Array(file.data)], { type: contentType }),
      file.filename
    );
    if (conversationId) {
      form.append("conversation_id", conversationId);
    }

    const body = await http.post(ENDPOINTS.upload, form);
    const result = decode(UploadResultSchema, body, ENDPOINTS.upload);

    logger.info(`File uploaded: ${result.name ?? file.filename}`);
    return result;
  }

  return {
    config,
    initialize,
    isInitialized: () => initialized,
    newWorkspace,
    query,
    getStyles,
    getPrompts,
    getSources,
    uploadFile,
    getAttachments,
    showConversation,
    switchConversation,
    deleteConversation,
    getConversations,
    isAuthenticated,
    getSessionInfo,
    getCurrentConversationId: () => currentConversationId,
    setLogLevel(level: string): void {
      const next = parseLogLevel(level);
      logger.setLevel(next);
      logger.info(`Log level changed to ${next}`);
    },
  };
}
