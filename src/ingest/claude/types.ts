/**
 * Claude export type definitions
 * Based on the conversations.json format from Claude data exports
 */

import { z } from 'zod';

/**
 * Typed content block. Only `text` blocks carry message prose;
 * `tool_use`, `tool_result` and others are ignored for content.
 */
export const ContentBlockSchema = z
  .object({
    type: z.string(),
    text: z.unknown().optional(),
  })
  .passthrough();
export type ContentBlock = z.infer<typeof ContentBlockSchema>;

/**
 * A single chat message
 */
export const ChatMessageSchema = z
  .object({
    uuid: z.string().min(1),
    sender: z.string().optional(),
    text: z.string().nullable().optional(),
    content: z.array(z.unknown()).nullable().optional(),
    created_at: z.unknown().optional(),
    updated_at: z.unknown().optional(),
    attachments: z.array(z.unknown()).optional(),
    files: z.array(z.unknown()).optional(),
  })
  .passthrough();
export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/**
 * A complete Claude conversation
 */
export const ConversationSchema = z
  .object({
    uuid: z.string().min(1),
    name: z.string().nullable().optional(),
    summary: z.string().nullable().optional(),
    created_at: z.string(),
    updated_at: z.unknown().optional(),
    chat_messages: z.array(z.unknown()).nullable().optional(),
  })
  .passthrough();
export type Conversation = z.infer<typeof ConversationSchema>;
