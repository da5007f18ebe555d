/**
 * CSV export tests
 */

import { describe, it, expect } from 'vitest';
import { createConversation, type Conversation, type SearchResult } from '../model/index.js';
import {
  conversationsToCsv,
  csvField,
  csvTimestamp,
  messagesToCsv,
  searchResultsToCsv,
} from './csv.js';

const first: Conversation = createConversation({
  id: 'conv-1',
  title: 'Budget, "final" draft',
  createdAt: new Date('2024-01-15T10:30:00.250Z'),
  updatedAt: new Date('2024-01-15T14:45:00Z'),
  messages: [
    { id: 'm1', role: 'user', content: 'Line one\nLine two', timestamp: new Date('2024-01-15T10:30:05Z') },
    { id: 'm2', role: 'assistant', content: 'Sure', timestamp: new Date('2024-01-15T10:30:47Z') },
  ],
});

const second: Conversation = createConversation({
  id: 'conv-2',
  title: 'Plain',
  createdAt: new Date('2024-02-01T08:00:00Z'),
  messages: [{ id: 'm3', role: 'user', content: '', timestamp: new Date('2024-02-01T08:00:00Z') }],
});

describe('csvField', () => {
  it('should quote only values that need it', () => {
    expect(csvField('plain')).toBe('plain');
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField('two\nlines')).toBe('"two\nlines"');
    expect(csvField('cr\rhere')).toBe('"cr\rhere"');
  });

  it('should write null as an empty field and numbers as text', () => {
    expect(csvField(null)).toBe('');
    expect(csvField(42)).toBe('42');
  });
});

describe('csvTimestamp', () => {
  it('should drop milliseconds', () => {
    expect(csvTimestamp(new Date('2024-01-15T10:30:00.250Z'))).toBe('2024-01-15T10:30:00Z');
  });
});

describe('conversationsToCsv', () => {
  it('should write one row per conversation with an empty updated_at when absent', () => {
    expect(conversationsToCsv([first, second])).toBe(
      [
        'conversation_id,title,created_at,updated_at,message_count',
        'conv-1,"Budget, ""final"" draft",2024-01-15T10:30:00Z,2024-01-15T14:45:00Z,2',
        'conv-2,Plain,2024-02-01T08:00:00Z,,1',
        '',
      ].join('\n')
    );
  });

  it('should write only the header for no conversations', () => {
    expect(conversationsToCsv([])).toBe('conversation_id,title,created_at,updated_at,message_count\n');
  });
});

describe('searchResultsToCsv', () => {
  it('should append the score to three decimals', () => {
    const results: SearchResult[] = [
      { conversation: second, score: 0.5, matchedMessageIds: [], snippet: '' },
      { conversation: first, score: 0.87654, matchedMessageIds: ['m1'], snippet: 'Line one' },
    ];

    expect(searchResultsToCsv(results)).toBe(
      [
        'conversation_id,title,created_at,updated_at,message_count,score',
        'conv-2,Plain,2024-02-01T08:00:00Z,,1,0.500',
        'conv-1,"Budget, ""final"" draft",2024-01-15T10:30:00Z,2024-01-15T14:45:00Z,2,0.877',
        '',
      ].join('\n')
    );
  });
});

describe('messagesToCsv', () => {
  it('should write every message and keep line breaks inside quotes', () => {
    expect(messagesToCsv([first, second])).toBe(
      'conversation_id,message_id,role,timestamp,content\n' +
        'conv-1,m1,user,2024-01-15T10:30:05Z,"Line one\nLine two"\n' +
        'conv-1,m2,assistant,2024-01-15T10:30:47Z,Sure\n' +
        'conv-2,m3,user,2024-02-01T08:00:00Z,\n'
    );
  });
});
