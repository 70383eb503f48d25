// src/core/batch/runner.ts
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { InvalidInputError } from '../errors.js';
import type { DecensoredPost, Post } from '../types/index.js';
import { isCensored } from '../decensor/service.js';

// Helper function to read from stdin (extracted for testability)
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const postSchema = z
  .object({
    id: z.number().int().nonnegative(),
    image_width: z.number().int().nonnegative(),
    md5: z.string().optional(),
  })
  .passthrough();

export type PostSource =
  | { kind: 'inline'; text: string }
  | { kind: 'file'; path: string }
  | { kind: 'stdin' };

export interface PostDecensorer {
  decensorIter(posts: Iterable<Post>): AsyncIterable<Post | DecensoredPost>;
}

export interface BatchOptions {
  source: PostSource;
  jsonl: boolean;
}

export interface BatchSummary {
  total: number;
  censored: number;
  resolved: number;
  unresolved: number;
  duration: number;
}

function toPost(value: unknown, position: string): Post {
  const parsed = postSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` (${issue.path.join('.')})` : '';
    throw new InvalidInputError(`Invalid post at ${position}${where}: ${issue?.message ?? 'unexpected shape'}`);
  }
  return parsed.data;
}

export type InputShape = 'object' | 'array' | 'lines';

export interface ParsedPosts {
  shape: InputShape;
  posts: Post[];
}

/**
 * Parses a JSON post object, a JSON array of posts, or JSON lines.
 */
export function parsePosts(content: string): ParsedPosts {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return { shape: 'array', posts: [] };
  }

  let document: unknown;
  let isDocument = true;
  try {
    document = JSON.parse(trimmed);
  } catch {
    isDocument = false;
  }

  if (isDocument) {
    if (Array.isArray(document)) {
      return { shape: 'array', posts: document.map((item, index) => toPost(item, `index ${index}`)) };
    }
    return { shape: 'object', posts: [toPost(document, 'document')] };
  }

  const posts = trimmed
    .split('\n')
    .map((line, index) => ({ line: line.trim(), lineNumber: index + 1 }))
    .filter(({ line }) => line.length > 0)
    .map(({ line, lineNumber }) => {
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        throw new InvalidInputError(`Line ${lineNumber} is not valid JSON`);
      }
      return toPost(value, `line ${lineNumber}`);
    });
  return { shape: 'lines', posts };
}

export class BatchRunner {
  constructor(private decensorer: PostDecensorer) {}

  async loadPosts(source: PostSource): Promise<ParsedPosts> {
    return parsePosts(await this.readSource(source));
  }

  private async readSource(source: PostSource): Promise<string> {
    switch (source.kind) {
      case 'inline':
        return source.text;
      case 'file':
        return readFile(source.path, 'utf-8');
      case 'stdin':
        return readStdin();
    }
  }

  async run(options: BatchOptions): Promise<BatchSummary> {
    const startTime = Date.now();
    const { shape, posts } = await this.loadPosts(options.source);

    const censored = posts.filter(isCensored).length;
    const results: Array<Post | DecensoredPost> = [];
    let resolved = 0;

    let index = 0;
    for await (const result of this.decensorer.decensorIter(posts)) {
      // A censored post that now carries an md5 was resolved.
      if (isCensored(posts[index]) && !isCensored(result)) {
        resolved++;
      }
      index++;

      if (options.jsonl) {
        console.log(JSON.stringify(result));
      } else {
        results.push(result);
      }
    }

    if (!options.jsonl) {
      const document = shape === 'object' ? results[0] : results;
      console.log(JSON.stringify(document, null, 2));
    }

    return {
      total: posts.length,
      censored,
      resolved,
      unresolved: censored - resolved,
      duration: Date.now() - startTime,
    };
  }
}
