/**
 * Canonical conversation model
 * Every provider adapter normalizes into these shapes
 */

import { z } from 'zod';

/**
 * Normalized message role
 */
export const RoleSchema = z.enum(['user', 'assistant', 'system']);
export type Role = z.infer<typeof RoleSchema>;

export const ROLES: readonly Role[] = RoleSchema.options;

/**
 * Opaque provider-specific fields. Never interpreted by the core.
 */
export const MetadataSchema = z.record(z.string(), z.unknown());
export type Metadata = Readonly<Record<string, unknown>>;

const InstantSchema = z
  .date()
  .refine((d) => !Number.isNaN(d.getTime()), { message: 'Invalid date' });

export const MessageSchema = z.object({
  id: z.string().min(1, 'Message id must be non-empty'),
  role: RoleSchema,
  content: z.string(),
  timestamp: InstantSchema,
  parentId: z.string().min(1).nullable().default(null),
  metadata: MetadataSchema.default({}),
});
export type MessageInput = z.input<typeof MessageSchema>;

export const ConversationSchema = z
  .object({
    id: z.string().min(1, 'Conversation id must be non-empty'),
    title: z.string(),
    createdAt: InstantSchema,
    updatedAt: InstantSchema.optional(),
    messages: z.array(MessageSchema).min(1, 'Conversation must contain at least one message'),
    metadata: MetadataSchema.default({}),
  })
  .superRefine((conv, ctx) => {
    if (conv.updatedAt && conv.updatedAt.getTime() < conv.createdAt.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['updatedAt'],
        message: `updatedAt (${conv.updatedAt.toISOString()}) is earlier than createdAt (${conv.createdAt.toISOString()})`,
      });
    }

    const seen = new Set<string>();
    conv.messages.forEach((message, index) => {
      if (seen.has(message.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['messages', index, 'id'],
          message: `Duplicate message id "${message.id}"`,
        });
      }
      seen.add(message.id);
    });
  });
export type ConversationInput = z.input<typeof ConversationSchema>;

/**
 * A single message. Immutable once constructed.
 */
export interface Message {
  readonly id: string;
  readonly role: Role;
  /** May be empty for deleted, redacted or tool-only messages; never trimmed */
  readonly content: string;
  readonly timestamp: Date;
  /** Parent message in the same conversation, null for roots and linear providers */
  readonly parentId: string | null;
  readonly metadata: Metadata;
}

/**
 * A conversation with its messages in display order. Immutable once constructed.
 */
export interface Conversation {
  readonly id: string;
  /** May be empty */
  readonly title: string;
  readonly createdAt: Date;
  readonly updatedAt?: Date;
  readonly messages: readonly Message[];
  readonly metadata: Metadata;
}
