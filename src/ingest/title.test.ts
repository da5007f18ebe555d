/**
 * Title lookup tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { claudeConversation, recordsSource } from '../test-utils/fixtures.js';
import { ClaudeAdapter } from './claude/index.js';
import { findConversationByTitle } from './title.js';

const adapter = new ClaudeAdapter();
const source = recordsSource([
  claudeConversation({ uuid: 'trip-1', name: 'Trip to Lisbon', messages: [{ uuid: 'a', text: 'plan' }] }),
  claudeConversation({ uuid: 'cook-1', name: 'Weeknight cooking', messages: [{ uuid: 'b', text: 'pasta' }] }),
  claudeConversation({ uuid: 'trip-2', name: 'Lisbon trip budget', messages: [{ uuid: 'c', text: 'costs' }] }),
]);

describe('findConversationByTitle', () => {
  it('should match a title substring case-insensitively', async () => {
    const match = await findConversationByTitle(adapter, source, 'COOKING');

    expect(match.conversation?.id).toBe('cook-1');
    expect(match.matchIds).toEqual(['cook-1']);
  });

  it('should report every match of an ambiguous title and hold the first', async () => {
    const match = await findConversationByTitle(adapter, source, 'lisbon');

    expect(match.conversation?.id).toBe('trip-1');
    expect(match.matchIds).toEqual(['trip-1', 'trip-2']);
  });

  it('should return no conversation when nothing matches', async () => {
    expect(await findConversationByTitle(adapter, source, 'gardening')).toEqual({ conversation: null, matchIds: [] });
  });

  it('should reject a blank title', async () => {
    await expect(findConversationByTitle(adapter, source, '   ')).rejects.toBeInstanceOf(ValidationError);
  });
});
