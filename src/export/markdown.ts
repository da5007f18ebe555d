/**
 * Markdown export module
 * Renders a canonical conversation as a markdown document
 */

import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { messageImages, type Conversation, type ImageRef, type Message, type Role } from '../model/index.js';
import type { ProviderName } from '../ingest/index.js';
import { formatDate, formatTimestamp, slugify } from '../utils/index.js';

/**
 * Options for markdown generation
 */
export interface MarkdownOptions {
  /** Recorded in the frontmatter when known */
  provider?: ProviderName;
  includeMetadata?: boolean;
  includeTimestamps?: boolean;
  roleLabels?: Partial<Record<Role, string>>;
}

const DEFAULT_ROLE_LABELS: Record<Role, string> = {
  user: '**User**',
  assistant: '**Assistant**',
  system: '**System**',
};

const EMPTY_CONTENT = '_(no text content)_';

/**
 * Generate filename from conversation
 * Format: YYYY-MM-DD-slug.md
 */
export function generateFilename(conversation: Conversation): string {
  return `${formatDate(conversation.createdAt)}-${slugify(conversation.title)}.md`;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Generate YAML frontmatter
 */
export function generateFrontmatter(conversation: Conversation, provider?: ProviderName): string {
  const lines = [
    '---',
    `title: ${quote(conversation.title)}`,
    `id: ${quote(conversation.id)}`,
  ];

  if (provider) {
    lines.push(`provider: ${provider}`);
  }

  lines.push(`created: ${formatTimestamp(conversation.createdAt)}`);
  if (conversation.updatedAt) {
    lines.push(`updated: ${formatTimestamp(conversation.updatedAt)}`);
  }
  lines.push(`message_count: ${conversation.messages.length}`);
  lines.push('---');

  return lines.join('\n');
}

const FILE_SERVICE_SCHEME = 'file-service://';

/**
 * Link target for an image: the file name ChatGPT uses inside its export
 * archive for `file-service://` pointers, otherwise the pointer itself
 */
export function imageLink(image: ImageRef): string {
  if (image.assetPointer.startsWith(FILE_SERVICE_SCHEME)) {
    return `${image.assetPointer.slice(FILE_SERVICE_SCHEME.length)}-sanitized.png`;
  }
  return image.assetPointer;
}

/**
 * Format a single message for markdown. Images come before the text.
 */
export function formatMessage(
  message: Message,
  options: Pick<MarkdownOptions, 'includeTimestamps' | 'roleLabels'> = {}
): string {
  const label = options.roleLabels?.[message.role] ?? DEFAULT_ROLE_LABELS[message.role];
  const includeTimestamps = options.includeTimestamps ?? true;
  const header = includeTimestamps
    ? `### ${label} (${formatTimestamp(message.timestamp)})`
    : `### ${label}`;

  const lines = [header, ''];
  const images = messageImages(message);
  for (const image of images) {
    lines.push(`![Image](${imageLink(image)})`, '');
  }
  if (message.content.length > 0) {
    lines.push(message.content, '');
  } else if (images.length === 0) {
    lines.push(EMPTY_CONTENT, '');
  }
  return lines.join('\n');
}

/**
 * Generate markdown content for a conversation
 */
export function renderMarkdown(conversation: Conversation, options: MarkdownOptions = {}): string {
  const sections: string[] = [];

  if (options.includeMetadata ?? true) {
    sections.push(generateFrontmatter(conversation, options.provider));
  }

  sections.push(`# ${conversation.title || '(No title)'}`);
  sections.push('');

  for (const message of conversation.messages) {
    sections.push(formatMessage(message, options));
  }

  return sections.join('\n');
}

export interface WriteMarkdownResult {
  filePath: string;
  filename: string;
  bytesWritten: number;
}

/**
 * Write a conversation to `<outputDir>/<generated filename>`
 */
export async function writeMarkdownFile(
  conversation: Conversation,
  outputDir: string,
  options: MarkdownOptions = {}
): Promise<WriteMarkdownResult> {
  const filename = generateFilename(conversation);
  const filePath = join(outputDir, filename);
  const content = renderMarkdown(conversation, options);

  await mkdir(outputDir, { recursive: true });
  await writeFile(filePath, content, 'utf-8');

  return {
    filePath,
    filename,
    bytesWritten: Buffer.byteLength(content, 'utf-8'),
  };
}
