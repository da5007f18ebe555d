/**
 * Thread reconstruction tests
 */

import { describe, it, expect } from 'vitest';
import { createConversation, createMessage, type Message } from '../model/index.js';
import { allThreads, children, rootMessages, threadTo, ThreadReconstructor } from './index.js';

const at = new Date('2024-01-01T00:00:00Z');

function msg(id: string, parentId: string | null): Message {
  return createMessage({ id, role: 'user', content: id, timestamp: at, parentId });
}

function idsOf(messages: Message[]): string[] {
  return messages.map((m) => m.id);
}

describe('ThreadReconstructor', () => {
  // root → a → a1
  //      → b
  const conversation = createConversation({
    id: 'c',
    title: 'Branches',
    createdAt: at,
    messages: [msg('root', null), msg('a', 'root'), msg('b', 'root'), msg('a1', 'a')],
  });

  it('should find the roots', () => {
    expect(idsOf(rootMessages(conversation))).toEqual(['root']);
  });

  it('should list children in message order', () => {
    expect(idsOf(children(conversation, 'root'))).toEqual(['a', 'b']);
    expect(children(conversation, 'b')).toEqual([]);
    expect(children(conversation, 'unknown')).toEqual([]);
  });

  it('should trace a message back to its root', () => {
    expect(idsOf(threadTo(conversation, 'a1'))).toEqual(['root', 'a', 'a1']);
    expect(threadTo(conversation, 'missing')).toEqual([]);
  });

  it('should enumerate every root-to-leaf path', () => {
    expect(allThreads(conversation).map(idsOf)).toEqual([
      ['root', 'a', 'a1'],
      ['root', 'b'],
    ]);
  });

  it('should return two paths for one root with two children', () => {
    const tree = new ThreadReconstructor([msg('r', null), msg('x', 'r'), msg('y', 'r')]);

    expect(tree.allThreads().map(idsOf)).toEqual([
      ['r', 'x'],
      ['r', 'y'],
    ]);
  });

  it('should treat linear histories as one root per message', () => {
    const linear = new ThreadReconstructor([msg('m1', null), msg('m2', null)]);

    expect(idsOf(linear.rootMessages())).toEqual(['m1', 'm2']);
    expect(linear.allThreads().map(idsOf)).toEqual([['m1'], ['m2']]);
  });

  it('should make messages with an unknown parent roots', () => {
    const orphaned = new ThreadReconstructor([msg('m1', 'gone'), msg('m2', 'm1')]);

    expect(idsOf(orphaned.rootMessages())).toEqual(['m1']);
    expect(idsOf(orphaned.threadTo('m2'))).toEqual(['m1', 'm2']);
  });

  it('should terminate on parent cycles', () => {
    const cyclic = new ThreadReconstructor([msg('x', 'y'), msg('y', 'x'), msg('self', 'self')]);

    expect(idsOf(cyclic.rootMessages())).toEqual(['self']);
    expect(idsOf(cyclic.threadTo('x'))).toEqual(['y', 'x']);
    expect(cyclic.allThreads().map(idsOf)).toEqual([['self']]);
  });
});
