/**
 * ChatGPT export type definitions
 * Based on the conversations.json format from ChatGPT data exports
 *
 * Fields whose values we parse ourselves (timestamps, message bodies) are
 * typed loosely here so one bad value degrades a message, not a conversation.
 */

import { z } from 'zod';

/**
 * Author information
 */
export const AuthorSchema = z
  .object({
    role: z.string(),
    name: z.string().nullable().optional(),
  })
  .passthrough();
export type Author = z.infer<typeof AuthorSchema>;

/**
 * Message content
 */
export const ContentSchema = z
  .object({
    content_type: z.string(),
    parts: z.array(z.unknown()).optional(),
    text: z.unknown().optional(),
  })
  .passthrough();
export type Content = z.infer<typeof ContentSchema>;

/**
 * A single message in a conversation
 */
export const MessageSchema = z
  .object({
    id: z.string().min(1),
    author: AuthorSchema,
    create_time: z.unknown().optional(),
    update_time: z.unknown().optional(),
    content: ContentSchema.nullable().optional(),
    status: z.string().optional(),
    recipient: z.string().optional(),
    metadata: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();
export type Message = z.infer<typeof MessageSchema>;

/**
 * Mapping entry - contains message and children
 */
export const MappingEntrySchema = z
  .object({
    id: z.string().optional(),
    message: z.unknown().optional(),
    parent: z.string().nullable().optional(),
    children: z.array(z.string()).default([]),
  })
  .passthrough();
export type MappingEntry = z.infer<typeof MappingEntrySchema>;

/**
 * Conversation mapping - node ID to entry
 */
export const MappingSchema = z.record(z.string(), MappingEntrySchema);
export type Mapping = z.infer<typeof MappingSchema>;

/**
 * A complete ChatGPT conversation
 */
export const ConversationSchema = z
  .object({
    id: z.string().min(1).optional(),
    conversation_id: z.string().min(1).optional(),
    title: z.string().nullable().optional(),
    create_time: z.number(),
    update_time: z.unknown().optional(),
    mapping: MappingSchema,
    current_node: z.string().nullable().optional(),
    default_model_slug: z.string().nullable().optional(),
    gizmo_id: z.string().nullable().optional(),
    is_archived: z.boolean().nullable().optional(),
  })
  .passthrough()
  .refine((conv) => conv.id !== undefined || conv.conversation_id !== undefined, {
    message: 'Conversation has neither id nor conversation_id',
    path: ['id'],
  });
export type Conversation = z.infer<typeof ConversationSchema>;
