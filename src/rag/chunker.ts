/**
 * Course Chunker
 *
 * Parses structured course documents (headers, lesson markers) and splits
 * lesson text into sentence-aligned chunks with character overlap.
 */

import { MalformedDocumentError } from '../errors.js';
import { RAG_DEFAULTS } from '../constants.js';
import type { Course, CourseChunk, Lesson, ParsedCourseDocument } from './types.js';

/**
 * Configuration for the chunker.
 */
export interface ChunkerConfig {
  /** Maximum chunk size in characters */
  chunkSize: number;
  /** Characters of the previous chunk repeated at the start of the next */
  chunkOverlap: number;
}

/**
 * Default chunker configuration.
 */
export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  chunkSize: RAG_DEFAULTS.CHUNK_SIZE,
  chunkOverlap: RAG_DEFAULTS.CHUNK_OVERLAP,
};

/**
 * Sentence boundary: whitespace after . ! or ? followed by a capital letter.
 * Abbreviations such as "e.g." and "Dr." do not end a sentence.
 */
const SENTENCE_BOUNDARY = /(?<!\w\.\w.)(?<![A-Z][a-z]\.)(?<=[.!?])\s+(?=[A-Z])/;

type HeaderKind = 'title' | 'link' | 'instructor';

const HEADER_PATTERNS: Array<{ kind: HeaderKind; regex: RegExp }> = [
  { kind: 'title', regex: /^course title:\s*(.*)$/i },
  { kind: 'link', regex: /^course link:\s*(.*)$/i },
  { kind: 'instructor', regex: /^course instructor:\s*(.*)$/i },
];

const LESSON_MARKER = /^lesson\s+(\d+):\s*(.*)$/i;
const LESSON_LINK = /^lesson link:\s*(.*)$/i;

/**
 * Lesson accumulated while scanning the document body.
 */
interface LessonDraft {
  lesson: Lesson;
  body: string[];
}

/**
 * Chunks course documents for indexing.
 */
export class CourseChunker {
  private config: ChunkerConfig;

  constructor(config: Partial<ChunkerConfig> = {}) {
    this.config = {
      chunkSize: config.chunkSize ?? DEFAULT_CHUNKER_CONFIG.chunkSize,
      chunkOverlap: config.chunkOverlap ?? DEFAULT_CHUNKER_CONFIG.chunkOverlap,
    };

    const { chunkSize, chunkOverlap } = this.config;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new RangeError(
        `chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`
      );
    }
  }

  getConfig(): ChunkerConfig {
    return { ...this.config };
  }

  /**
   * Split text into sentence-aligned chunks of at most `chunkSize` characters.
   * Each chunk after the first starts with the last `chunkOverlap` characters
   * of the previous one followed by a space. The carried overlap shrinks when
   * the next sentence would not fit beside it; only a sentence longer than
   * `chunkSize` is ever cut.
   */
  chunkText(text: string): string[] {
    const normalized = text.trim().replace(/\s+/g, ' ');
    if (!normalized) return [];

    const sentences = normalized
      .split(SENTENCE_BOUNDARY)
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const { chunkSize, chunkOverlap } = this.config;
    const chunks: string[] = [];
    let current = '';
    // Whether `current` holds anything beyond the carried overlap
    let hasBody = false;

    const flush = (): void => {
      chunks.push(current);
      current = chunkOverlap > 0 ? current.slice(-chunkOverlap) : '';
      hasBody = false;
    };

    for (const sentence of sentences) {
      let rest = sentence;

      while (rest.length > 0) {
        const prefix = current ? current + ' ' : '';

        if (prefix.length + rest.length <= chunkSize) {
          current = prefix + rest;
          hasBody = true;
          rest = '';
        } else if (hasBody) {
          flush();
        } else if (rest.length <= chunkSize) {
          // Sentence fits alone: keep only as much carry as leaves room for it
          const room = chunkSize - rest.length - 1;
          current = room > 0 ? current.slice(-room) + ' ' + rest : rest;
          hasBody = true;
          rest = '';
        } else if (prefix.length >= chunkSize) {
          // Carry leaves no room for text
          current = '';
        } else {
          // Sentence does not fit an empty chunk: cut at the remaining budget
          const budget = chunkSize - prefix.length;
          current = prefix + rest.slice(0, budget);
          hasBody = true;
          rest = rest.slice(budget).trimStart();
        }
      }
    }

    if (hasBody) {
      chunks.push(current);
    }

    return chunks;
  }

  /**
   * Parse a course document into a course and its content chunks.
   *
   * The first three non-blank lines must be the `Course Title:`,
   * `Course Link:` and `Course Instructor:` headers in any order.
   *
   * @param source - File name or path used in error messages
   * @throws MalformedDocumentError
   */
  parseCourseDocument(text: string, source?: string): ParsedCourseDocument {
    const lines = text.replace(/\r\n?/g, '\n').split('\n');
    const { course, bodyStart } = this.parseHeaders(lines, source);

    const drafts: LessonDraft[] = [];
    const seen = new Set<number>();
    const preamble: string[] = [];
    let active: LessonDraft | null = null;

    for (let i = bodyStart; i < lines.length; i++) {
      const line = lines[i];
      const marker = LESSON_MARKER.exec(line.trim());

      if (!marker) {
        if (active) {
          active.body.push(line);
        } else {
          preamble.push(line);
        }
        continue;
      }

      const lessonNumber = parseInt(marker[1], 10);
      if (seen.has(lessonNumber)) {
        throw new MalformedDocumentError(
          `duplicate lesson number ${lessonNumber} in course '${course.title}'`,
          source
        );
      }
      seen.add(lessonNumber);

      const lesson: Lesson = { lessonNumber, title: marker[2].trim() };
      const linkMatch = i + 1 < lines.length ? LESSON_LINK.exec(lines[i + 1].trim()) : null;
      if (linkMatch) {
        const link = linkMatch[1].trim();
        if (link) lesson.link = link;
        i++;
      }

      active = { lesson, body: [] };
      drafts.push(active);
    }

    const chunks: CourseChunk[] = [];

    if (drafts.length === 0) {
      // No lesson markers: chunk the whole body without lesson context
      for (const content of this.chunkText(preamble.join('\n'))) {
        chunks.push({ courseTitle: course.title, chunkIndex: chunks.length, content });
      }
      return { course, chunks };
    }

    for (const { lesson, body } of drafts) {
      course.lessons.push(lesson);

      const pieces = this.chunkText(body.join('\n'));
      pieces.forEach((piece, idx) => {
        const content = idx === 0
          ? `Course ${course.title} Lesson ${lesson.lessonNumber} content: ${piece}`
          : piece;
        chunks.push({
          courseTitle: course.title,
          lessonNumber: lesson.lessonNumber,
          chunkIndex: chunks.length,
          content,
        });
      });
    }

    return { course, chunks };
  }

  /**
   * Read the three header lines. Returns the course (without lessons) and
   * the index of the first body line.
   */
  private parseHeaders(
    lines: string[],
    source?: string
  ): { course: Course; bodyStart: number } {
    const found = new Map<HeaderKind, string>();
    let consumed = 0;
    let i = 0;

    for (; i < lines.length && consumed < 3; i++) {
      const line = lines[i].trim();
      if (!line) continue;
      consumed++;

      const header = HEADER_PATTERNS.find((h) => h.regex.test(line));
      if (!header || found.has(header.kind)) {
        break;
      }
      const match = header.regex.exec(line);
      found.set(header.kind, match ? match[1].trim() : '');
    }

    const missing = HEADER_PATTERNS
      .filter((h) => !found.has(h.kind))
      .map((h) => h.kind);
    if (missing.length > 0) {
      throw new MalformedDocumentError(
        `missing course header(s): ${missing.join(', ')}`,
        source
      );
    }

    const title = found.get('title') ?? '';
    if (!title) {
      throw new MalformedDocumentError('course title is empty', source);
    }

    const course: Course = { title, lessons: [] };
    const link = found.get('link');
    if (link) course.link = link;
    const instructor = found.get('instructor');
    if (instructor) course.instructor = instructor;

    return { course, bodyStart: i };
  }
}
