/**
 * ChatGPT export adapter
 *
 * Messages live in a `mapping` tree keyed by node id. Nodes without a
 * message (the synthetic root, navigation nodes) are collapsed, so each
 * message's parentId names the closest ancestor that carries a message.
 */

import {
  createConversation,
  IMAGES_METADATA_KEY,
  ImageRefSchema,
  type Conversation,
  type ImageRef,
  type MessageInput,
  type Role,
} from '../../model/index.js';
import { ValidationError } from '../../errors/index.js';
import {
  ExportAdapter,
  describeIssues,
  isRecord,
  type ParseOutcome,
  type ProviderName,
  type RecordContext,
} from '../provider.js';
import { parseEpochSeconds } from '../timestamps.js';
import {
  ConversationSchema,
  MessageSchema,
  type Content,
  type Mapping,
  type Message as RawMessage,
} from './types.js';

const ROLE_MAP: Readonly<Record<string, Role>> = {
  user: 'user',
  assistant: 'assistant',
  system: 'system',
  tool: 'assistant',
};

/**
 * Content types that carry tool calls or tool output rather than prose
 */
const TOOL_CONTENT_TYPES = new Set([
  'code',
  'execution_output',
  'tether_browsing_display',
  'tether_quote',
  'system_error',
  'computer_output',
]);

/**
 * Extract the text of a message body
 *
 * String parts and object parts with a string `text` are joined with a
 * newline; image pointers contribute nothing. Falls back to `content.text`,
 * then to the empty string. Tool calls and tool output yield ''.
 */
export function extractContent(content: Content | null | undefined): string {
  if (!content) return '';
  if (TOOL_CONTENT_TYPES.has(content.content_type)) return '';

  const texts: string[] = [];
  for (const part of content.parts ?? []) {
    if (typeof part === 'string') {
      if (part.length > 0) texts.push(part);
    } else if (isRecord(part) && typeof part.text === 'string' && part.text.length > 0) {
      texts.push(part.text);
    }
  }
  if (texts.length > 0) return texts.join('\n');

  return typeof content.text === 'string' ? content.text : '';
}

const IMAGE_PART_TYPE = 'image_asset_pointer';
const IMAGE_PART_FIELDS = new Set(['content_type', 'asset_pointer', 'size_bytes', 'width', 'height']);

/**
 * Image pointers among the parts of a multimodal message body.
 * Parts that do not validate are reported through `onRejected` and left out.
 */
export function extractImages(
  content: Content | null | undefined,
  onRejected?: (reason: string) => void
): ImageRef[] {
  const images: ImageRef[] = [];
  for (const part of content?.parts ?? []) {
    if (!isRecord(part) || part.content_type !== IMAGE_PART_TYPE) continue;

    const parsed = ImageRefSchema.safeParse({
      assetPointer: part.asset_pointer,
      sizeBytes: part.size_bytes ?? null,
      width: part.width ?? null,
      height: part.height ?? null,
      metadata: Object.fromEntries(Object.entries(part).filter(([key]) => !IMAGE_PART_FIELDS.has(key))),
    });
    if (parsed.success) {
      images.push(parsed.data);
    } else {
      onRejected?.(`Skipped malformed image reference: ${describeIssues(parsed.error.issues)}`);
    }
  }
  return images;
}

/**
 * Map a ChatGPT author role onto the canonical roles
 */
export function normalizeRole(raw: string): Role | null {
  return ROLE_MAP[raw] ?? null;
}

export class ChatGPTAdapter extends ExportAdapter {
  readonly provider: ProviderName = 'chatgpt';

  protected parseRecord(value: unknown, context: RecordContext): ParseOutcome {
    const fallbackId = `#${context.index}`;
    const identifier = isRecord(value)
      ? stringField(value, 'id') ?? stringField(value, 'conversation_id') ?? fallbackId
      : fallbackId;

    const parsed = ConversationSchema.safeParse(value);
    if (!parsed.success) {
      return { ok: false, identifier, reason: `Schema validation failed: ${describeIssues(parsed.error.issues)}` };
    }
    const raw = parsed.data;
    const id = raw.id ?? raw.conversation_id ?? identifier;

    const createdAt = parseEpochSeconds(raw.create_time);
    if (!createdAt) {
      return { ok: false, identifier: id, reason: `Unparsable create_time: ${String(raw.create_time)}` };
    }

    let updatedAt: Date | undefined;
    if (raw.update_time !== undefined && raw.update_time !== null) {
      updatedAt = parseEpochSeconds(raw.update_time) ?? undefined;
      if (!updatedAt) {
        context.warn(id, `Unparsable update_time ${String(raw.update_time)}; treated as absent`);
      }
    }

    const messages = this.extractMessages(id, raw.mapping, createdAt, context);
    if (messages.length === 0) {
      return { ok: false, identifier: id, reason: 'Conversation has no messages' };
    }

    const metadata: Record<string, unknown> = {};
    if (raw.current_node != null) metadata.current_node = raw.current_node;
    if (raw.default_model_slug != null) metadata.default_model_slug = raw.default_model_slug;
    if (raw.is_archived != null) metadata.is_archived = raw.is_archived;
    if (raw.gizmo_id != null) metadata.gizmo_id = raw.gizmo_id;

    let conversation: Conversation;
    try {
      conversation = createConversation({
        id,
        title: raw.title ?? '',
        createdAt,
        updatedAt,
        messages,
        metadata,
      });
    } catch (err) {
      if (err instanceof ValidationError) {
        return { ok: false, identifier: id, reason: err.message };
      }
      throw err;
    }
    return { ok: true, conversation };
  }

  /**
   * Messages of the mapping in chronological order (stable for equal times)
   */
  private extractMessages(
    conversationId: string,
    mapping: Mapping,
    createdAt: Date,
    context: RecordContext
  ): MessageInput[] {
    const kept = new Map<string, RawMessage>(); // node id → message
    const messageIdOfNode = new Map<string, string>();
    const usedIds = new Set<string>();

    let position = 0;
    for (const [nodeId, node] of Object.entries(mapping)) {
      position++;
      if (node.message === undefined || node.message === null) continue;

      const parsed = MessageSchema.safeParse(node.message);
      if (!parsed.success) {
        context.skip(
          `${conversationId}/${nodeId || `#${position}`}`,
          `Malformed message: ${describeIssues(parsed.error.issues)}`
        );
        continue;
      }
      if (usedIds.has(parsed.data.id)) {
        context.skip(`${conversationId}/${parsed.data.id}`, 'Duplicate message id');
        continue;
      }
      usedIds.add(parsed.data.id);
      kept.set(nodeId, parsed.data);
      messageIdOfNode.set(nodeId, parsed.data.id);
    }

    const resolveParent = (nodeId: string): string | null => {
      const seen = new Set<string>([nodeId]);
      let parent = mapping[nodeId]?.parent ?? null;
      while (parent !== null && !seen.has(parent)) {
        const messageId = messageIdOfNode.get(parent);
        if (messageId !== undefined) return messageId;
        seen.add(parent);
        parent = mapping[parent]?.parent ?? null;
      }
      return null;
    };

    const messages: MessageInput[] = [];
    for (const [nodeId, raw] of kept) {
      const rawRole = raw.author.role;
      let role = normalizeRole(rawRole);
      if (role === null) {
        context.logger.debug({ conversationId, messageId: raw.id, role: rawRole }, 'Unknown author role, using assistant');
        role = 'assistant';
      }

      let timestamp = parseEpochSeconds(raw.create_time);
      if (!timestamp) {
        context.warn(
          raw.id,
          `Missing or unparsable create_time ${JSON.stringify(raw.create_time ?? null)}; using conversation created_at`
        );
        timestamp = createdAt;
      }

      const metadata: Record<string, unknown> = { original_role: rawRole };
      if (raw.content?.content_type) metadata.content_type = raw.content.content_type;
      const modelSlug = raw.metadata?.model_slug;
      if (typeof modelSlug === 'string') metadata.model_slug = modelSlug;
      if (raw.recipient && raw.recipient !== 'all') metadata.recipient = raw.recipient;
      const images = extractImages(raw.content, (reason) => context.warn(raw.id, reason));
      if (images.length > 0) metadata[IMAGES_METADATA_KEY] = images;

      messages.push({
        id: raw.id,
        role,
        content: extractContent(raw.content),
        timestamp,
        parentId: resolveParent(nodeId),
        metadata,
      });
    }

    return messages.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
}

function stringField(value: Record<string, unknown>, key: string): string | undefined {
  const field = value[key];
  return typeof field === 'string' && field.length > 0 ? field : undefined;
}
