/**
 * TTKIA SDK Types
 *
 * Configuration, transport and client contracts. Response shapes decoded from
 * the API live in ./api and are re-exported here.
 */

export * from "./api";

import type {
  Attachment,
  ConversationDetails,
  ConversationSummary,
  EnvironmentInfo,
  Option,
  QueryResponse,
  Source,
  UploadResult,
  Workspace,
  AttachedFile,
  AttachedUrl,
} from "./api";

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

/** Destination of log lines; `console` satisfies it */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;

  /** Current minimum level */
  getLevel(): LogLevel;

  /** Change the minimum level at runtime */
  setLevel(level: LogLevel): void;

  /** Whether a record at `level` would be written */
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface TTKIAConfig {
  /** API base URL, without trailing slash */
  baseUrl: string;

  /** Application token sent as a bearer token */
  appToken: string;

  /** Minimum log level */
  logLevel: LogLevel;

  /** Prefix of every log line */
  loggerName: string;

  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

/** Options for creating a client */
export interface CreateClientOptions {
  /** API base URL (required) */
  baseUrl: string;

  /** Application token (required) */
  appToken: string;

  /** Log level name, case-insensitive */
  logLevel?: string;

  /** Prefix of every log line */
  loggerName?: string;

  /** Per-request timeout in milliseconds */
  timeoutMs?: number;

  /** Logger to use instead of the console logger */
  logger?: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// HTTP
// ─────────────────────────────────────────────────────────────────────────────

export interface HTTPClient {
  /** Make a GET request */
  get(path: string, options?: HTTPRequestOptions): Promise<unknown>;

  /** Make a POST request; FormData bodies are sent as multipart */
  post(path: string, body?: unknown, options?: HTTPRequestOptions): Promise<unknown>;
}

export interface HTTPRequestOptions {
  /** Request headers */
  headers?: Record<string, string>;
  /** Query parameters */
  params?: Record<string, string>;
  /** Timeout in ms, overriding the client default */
  timeoutMs?: number;
  /** Abort signal */
  signal?: AbortSignal;
}

export interface HttpClientOptions {
  /** Headers sent with every request */
  headers?: Record<string, string>;
  /** Default timeout in ms */
  timeoutMs?: number;
  /** Request/response logging */
  logger?: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────────────────

export interface QueryOptions {
  /** Conversation to query in; defaults to the current conversation */
  conversationId?: string;
  /** Prompt id */
  prompt?: string;
  /** Response style id */
  style?: string;
  /** Step-by-step reasoning and query extension */
  teacherMode?: boolean;
  /** Source titles to search; all available sources when omitted */
  sources?: string[];
  /** Files to attach to the query */
  attachedFiles?: AttachedFile[];
  /** URLs to attach to the query */
  attachedUrls?: AttachedUrl[];
  /** Allow the assistant to search the web */
  webSearch?: boolean;
  /** Title stored with the query */
  title?: string;
}

/** In-memory file contents to upload */
export interface UploadBytes {
  data: Uint8Array;
  filename: string;
}

export interface UploadOptions {
  /** Conversation to attach the file to; defaults to the current conversation */
  conversationId?: string;
  /** Name sent to the server instead of the file's own */
  filename?: string;
}

export interface SessionInfo {
  authenticated: boolean;
  username: string | null;
  baseUrl: string;
  appTokenPresent: boolean;
  timeoutMs: number;
  currentConversationId: string | null;
}

/**
 * TTKIA assistant client.
 *
 * One method per API capability; each issues a single request and decodes the
 * JSON body. The only local state is the current conversation id.
 */
export interface TTKIAClient {
  /** Resolved configuration */
  readonly config: TTKIAConfig;

  /** Open the server-side session; resolves to null when it fails */
  initialize(): Promise<EnvironmentInfo | null>;

  /** Whether initialize() succeeded */
  isInitialized(): boolean;

  /** Create a workspace and make it the current conversation */
  newWorkspace(): Promise<Workspace>;

  /** Ask the assistant */
  query(queryText: string, options?: QueryOptions): Promise<QueryResponse>;

  /** Available response styles */
  getStyles(): Promise<Option[]>;

  /** Available prompts */
  getPrompts(): Promise<Option[]>;

  /** Available knowledge sources */
  getSources(): Promise<Source[]>;

  /** Upload a file path or in-memory bytes to a conversation */
  uploadFile(input: string | UploadBytes, options?: UploadOptions): Promise<UploadResult>;

  /** Files attached to a conversation */
  getAttachments(conversationId?: string): Promise<Attachment[]>;

  /** Conversation details: messages, attachments, timestamps */
  showConversation(conversationId?: string): Promise<ConversationDetails>;

  /** Make an existing conversation the current one */
  switchConversation(conversationId: string): Promise<ConversationDetails>;

  /** Delete a conversation; clears the current id when it matches */
  deleteConversation(conversationId: string): Promise<boolean>;

  /** Conversation history of the token's user */
  getConversations(): Promise<ConversationSummary[]>;

  /** Probe the token; never rejects */
  isAuthenticated(): Promise<boolean>;

  /** Session metadata */
  getSessionInfo(): Promise<SessionInfo>;

  /** Current conversation id, if any */
  getCurrentConversationId(): string | null;

  /** Change the log level at runtime */
  setLogLevel(level: string): void;
}
