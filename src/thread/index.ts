/**
 * Thread reconstruction over a conversation's message tree
 *
 * Works on an already materialized conversation. Children are visited in
 * message-list order, so output is stable for identical input. A parentId
 * that points outside the conversation makes its message a root.
 */

import type { Conversation, Message } from '../model/index.js';

export class ThreadReconstructor {
  private readonly byId = new Map<string, Message>();
  private readonly childrenOf = new Map<string, Message[]>();
  private readonly roots: Message[] = [];

  constructor(messages: readonly Message[]) {
    for (const message of messages) {
      if (!this.byId.has(message.id)) {
        this.byId.set(message.id, message);
      }
    }

    for (const message of messages) {
      const parentId = message.parentId;
      if (parentId === null || parentId === message.id || !this.byId.has(parentId)) {
        this.roots.push(message);
        continue;
      }
      const siblings = this.childrenOf.get(parentId);
      if (siblings) siblings.push(message);
      else this.childrenOf.set(parentId, [message]);
    }
  }

  static fromConversation(conversation: Conversation): ThreadReconstructor {
    return new ThreadReconstructor(conversation.messages);
  }

  /**
   * Messages without a (resolvable) parent
   */
  rootMessages(): Message[] {
    return [...this.roots];
  }

  /**
   * Direct descendants of a message
   */
  children(messageId: string): Message[] {
    return [...(this.childrenOf.get(messageId) ?? [])];
  }

  /**
   * Ancestor chain from a root down to the message, inclusive.
   * Empty when the message is unknown.
   */
  threadTo(messageId: string): Message[] {
    const chain: Message[] = [];
    const seen = new Set<string>();
    let current = this.byId.get(messageId);

    while (current && !seen.has(current.id)) {
      chain.push(current);
      seen.add(current.id);
      current = current.parentId !== null ? this.byId.get(current.parentId) : undefined;
    }
    return chain.reverse();
  }

  /**
   * Every root-to-leaf path, depth first
   */
  allThreads(): Message[][] {
    const threads: Message[][] = [];

    const walk = (message: Message, path: Message[], onPath: Set<string>) => {
      const next = [...path, message];
      const kids = (this.childrenOf.get(message.id) ?? []).filter((k) => !onPath.has(k.id));
      if (kids.length === 0) {
        threads.push(next);
        return;
      }
      onPath.add(message.id);
      for (const child of kids) {
        walk(child, next, onPath);
      }
      onPath.delete(message.id);
    };

    for (const root of this.roots) {
      walk(root, [], new Set());
    }
    return threads;
  }
}

export function rootMessages(conversation: Conversation): Message[] {
  return ThreadReconstructor.fromConversation(conversation).rootMessages();
}

export function children(conversation: Conversation, messageId: string): Message[] {
  return ThreadReconstructor.fromConversation(conversation).children(messageId);
}

export function threadTo(conversation: Conversation, messageId: string): Message[] {
  return ThreadReconstructor.fromConversation(conversation).threadTo(messageId);
}

export function allThreads(conversation: Conversation): Message[][] {
  return ThreadReconstructor.fromConversation(conversation).allThreads();
}
