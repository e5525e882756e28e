/**
 * In-process fake of the TTKIA API
 *
 * Listens on an ephemeral loopback port and keeps conversations in memory,
 * so workflow tests can exercise the real fetch transport end to end.
 */

import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { z } from "zod";

interface FakeAttachment {
  name: string;
  size: number;
}

interface FakeMessage {
  role: "user" | "assistant";
  content: string;
  timestamp: string;
}

interface FakeConversation {
  conversation_id: string;
  title: string;
  created_at: string;
  messages: FakeMessage[];
  file_attachments: FakeAttachment[];
}

export interface FakeTTKIAServer {
  baseUrl: string;
  conversations: Map<string, FakeConversation>;
  close(): Promise<void>;
}

const SOURCES = [{ title: "Firewall runbook" }, { title: "SD-WAN guide" }];

const ConversationRefSchema = z.object({ conversation_id: z.string() });

const QueryBodySchema = z.object({
  query: z.string(),
  conversation_id: z.string().nullable(),
  sources: z.array(z.string()),
  teacher_mode: z.boolean(),
  web_search: z.boolean(),
  title: z.string(),
});

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

export async function startFakeTTKIAServer(token: string): Promise<FakeTTKIAServer> {
  const conversations = new Map<string, FakeConversation>();
  let nextId = 1;
  const now = () => new Date().toISOString();

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const raw = await readBody(req);
    if (req.headers.authorization !== `Bearer ${token}`) {
      sendJson(res, 401, { detail: "Invalid token" });
      return;
    }

    const route = `${req.method} ${new URL(req.url ?? "/", "http://localhost").pathname}`;

    const json = (): unknown => (raw.length ? JSON.parse(raw.toString("utf-8")) : {});

    switch (route) {
      case "POST /env":
        return sendJson(res, 200, { environment: "test" });

      case "POST /new-workspace": {
        const conversation: FakeConversation = {
          conversation_id: `conv-${nextId++}`,
          title: "New workspace",
          created_at: now(),
          messages: [],
          file_attachments: [],
        };
        conversations.set(conversation.conversation_id, conversation);
        return sendJson(res, 200, { conversation_id: conversation.conversation_id });
      }

      case "GET /get_styles":
        return sendJson(res, 200, { styles: [{ id: "concise" }, { id: "detailed" }] });

      case "GET /get_prompts":
        return sendJson(res, 200, { prompts: [{ id: "default" }] });

      case "POST /get_sources":
        return sendJson(res, 200, SOURCES);

      case "GET /auth/users/me":
        return sendJson(res, 200, {
          username: "tester",
          history_chat: {
            conversations: [...conversations.values()].map(({ conversation_id, title }) => ({
              conversation_id,
              title,
            })),
          },
        });

      case "POST /conversation-info": {
        const { conversation_id } = ConversationRefSchema.parse(json());
        const conversation = conversations.get(conversation_id);
        if (!conversation) {
          return sendJson(res, 404, { detail: "Conversation not found" });
        }
        return sendJson(res, 200, conversation);
      }

      case "POST /forget": {
        const { conversation_id } = ConversationRefSchema.parse(json());
        conversations.delete(conversation_id);
        return sendJson(res, 200, { status: "deleted" });
      }

      case "POST /chat-upload": {
        const form = await new Response(new Uint8Array(raw), {
          headers: { "content-type": req.headers["content-type"] ?? "" },
        }).formData();
        const file = form.get("file");
        const conversationId = form.get("conversation_id");
        const conversation =
          typeof conversationId === "string" ? conversations.get(conversationId) : undefined;

        if (!(file instanceof File)) {
          return sendJson(res, 422, { detail: "file is required" });
        }
        if (!conversation) {
          return sendJson(res, 404, { detail: "Conversation not found" });
        }

        const attachment = { name: file.name, size: file.size };
        conversation.file_attachments.push(attachment);
        return sendJson(res, 200, { ...attachment, status: "uploaded" });
      }

      case "POST /query_complete": {
        const body = QueryBodySchema.parse(json());
        const conversation = body.conversation_id
          ? conversations.get(body.conversation_id)
          : undefined;
        if (body.conversation_id && !conversation) {
          return sendJson(res, 404, { detail: "Conversation not found" });
        }

        const responseText = `Answer to: ${body.query}`;
        conversation?.messages.push(
          { role: "user", content: body.query, timestamp: now() },
          { role: "assistant", content: responseText, timestamp: now() }
        );

        return sendJson(res, 200, {
          response_text: responseText,
          conversation_id: body.conversation_id,
          message_id: `msg-${nextId++}`,
          docs: body.sources.slice(0, 1).map((source) => ({ source })),
          webs: body.web_search ? [{ title: "Web result", url: "https://docs.example/web" }] : [],
          confidence: 0.9,
          teacher_mode_active: body.teacher_mode,
          thinking_process: body.teacher_mode ? ["Identify the topic", "Answer"] : [],
          query: body.query,
          query_extended: body.teacher_mode ? `${body.query} (extended)` : undefined,
        });
      }

      default:
        return sendJson(res, 404, { detail: `No route ${route}` });
    }
  }

  const server = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      sendJson(res, 500, { detail: error instanceof Error ? error.message : String(error) });
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Fake TTKIA server is not listening on a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    conversations,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
