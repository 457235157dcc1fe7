// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { CourseAssistant } from '../src/assistant.js';
import type { MockProvider, MockResponse } from '../src/providers/mock.js';
import { HashingEmbeddingProvider } from './helpers/hashing-embeddings.js';
import { VECTORS_COURSE, COOKING_COURSE, makeTempDir, removeTempDir, writeCourseFolder } from './helpers/fixtures.js';
import {
  createMockProvider,
  mockTextResponse,
  mockToolResponse,
  mockToolCall,
  mockErrorResponse,
} from './helpers/mock-provider.js';

describe('CourseAssistant', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  async function createAssistant(
    responses: MockResponse[],
    maxHistory = 2
  ): Promise<{ assistant: CourseAssistant; provider: MockProvider }> {
    const provider = createMockProvider(responses);
    const assistant = new CourseAssistant({
      provider,
      embeddings: new HashingEmbeddingProvider(),
      indexPath: path.join(tempDir, 'index'),
      maxHistory,
      retryOptions: { maxRetries: 0 },
    });
    await assistant.initialize();
    return { assistant, provider };
  }

  async function indexCourses(assistant: CourseAssistant): Promise<void> {
    const folder = writeCourseFolder(tempDir, {
      'vectors.txt': VECTORS_COURSE,
      'cooking.txt': COOKING_COURSE,
    });
    const summary = await assistant.addCourseFolder(folder);
    expect(summary).toEqual({ coursesAdded: 2, chunksAdded: 4, skipped: 0, failed: 0 });
  }

  it('builds with default settings when only the collaborators are given', async () => {
    const assistant = new CourseAssistant({
      provider: createMockProvider([]),
      embeddings: new HashingEmbeddingProvider(),
      indexPath: path.join(tempDir, 'index'),
    });
    await assistant.initialize();
    await indexCourses(assistant);

    expect(assistant.sessions.getMaxHistory()).toBe(2);
    expect(await assistant.getCourseAnalytics()).toEqual({
      totalCourses: 2,
      courseTitles: ['Cooking Basics', 'Intro to Vectors'],
    });
  });

  it('answers from a lesson search with its source', async () => {
    const call = mockToolCall('search_course_content', {
      query: 'what is a vector',
      course_name: 'Intro to Vectors',
      lesson_number: 0,
    });
    const { assistant, provider } = await createAssistant([
      mockToolResponse([call]),
      mockTextResponse('A vector is an ordered list of numbers.'),
    ]);
    await indexCourses(assistant);

    const response = await assistant.query('What is a vector?');

    expect(response).toEqual({
      answer: 'A vector is an ordered list of numbers.',
      sources: [{
        label: 'Intro to Vectors - Lesson 0',
        courseTitle: 'Intro to Vectors',
        lessonNumber: 0,
        link: 'https://example.com/vectors/0',
      }],
      sessionId: 'session_1',
      outcome: 'answered',
    });

    const lastMessage = provider.getLastCall()?.messages[2];
    expect(lastMessage?.content).toEqual([{
      type: 'tool_result',
      tool_use_id: call.id,
      name: 'search_course_content',
      content: '[Intro to Vectors - Lesson 0]\n' +
        'Course Intro to Vectors Lesson 0 content: A vector is an ordered list of numbers. ' +
        'Vectors describe magnitude and direction.',
      is_error: false,
    }]);
  });

  it('lists courses without recording sources', async () => {
    const { assistant, provider } = await createAssistant([
      mockToolResponse([mockToolCall('list_all_courses')]),
      mockTextResponse('There are two courses.'),
    ]);
    await indexCourses(assistant);

    const response = await assistant.query('Which courses are there?');

    expect(response.sources).toEqual([]);
    const results = provider.getLastCall()?.messages[2].content;
    expect(Array.isArray(results) ? results[0].content : undefined).toBe(
      'Available courses (2):\n' +
      '- **Cooking Basics** by Sam Sample (3 lessons) [Course Link](https://example.com/cooking)\n' +
      '- **Intro to Vectors** by Ada Example (2 lessons) [Course Link](https://example.com/vectors)'
    );
  });

  it('carries the last two exchanges into later queries', async () => {
    const { assistant, provider } = await createAssistant([
      mockTextResponse('answer one'),
      mockTextResponse('answer two'),
      mockTextResponse('answer three'),
      mockTextResponse('answer four'),
    ]);
    const sessionId = assistant.sessions.createSession();

    await assistant.query('question one', sessionId);
    await assistant.query('question two', sessionId);
    await assistant.query('question three', sessionId);
    await assistant.query('question four', sessionId);

    const systemPrompt = provider.getLastCall()?.systemPrompt ?? '';
    expect(systemPrompt.endsWith(
      '\n\nPrevious conversation:\n' +
      'User: question two\nAssistant: answer two\nUser: question three\nAssistant: answer three'
    )).toBe(true);
    expect(systemPrompt).not.toContain('question one');
    expect(assistant.sessions.getHistory(sessionId).map((e) => e.query)).toEqual([
      'question three',
      'question four',
    ]);
  });

  it('keeps sessions independent', async () => {
    const { assistant, provider } = await createAssistant([
      mockTextResponse('first'),
      mockTextResponse('second'),
    ]);

    const first = await assistant.query('about cooking');
    const second = await assistant.query('about vectors');

    expect(first.sessionId).not.toBe(second.sessionId);
    expect(provider.getLastCall()?.systemPrompt).not.toContain('Previous conversation');
  });

  it('does not remember failed queries', async () => {
    const { assistant } = await createAssistant([
      mockErrorResponse('bad request'),
      mockErrorResponse('still bad'),
    ]);
    const sessionId = assistant.sessions.createSession();

    const response = await assistant.query('question', sessionId);

    expect(response.outcome).toBe('failed');
    expect(response.answer).toBe('Query failed: still bad');
    expect(assistant.sessions.getHistory(sessionId)).toEqual([]);
  });

  it('reports analytics and outlines', async () => {
    const { assistant } = await createAssistant([]);
    await indexCourses(assistant);

    expect(await assistant.getCourseAnalytics()).toEqual({
      totalCourses: 2,
      courseTitles: ['Cooking Basics', 'Intro to Vectors'],
    });

    const outline = await assistant.getCourseOutline('Cooking Basics');
    expect(outline?.title).toBe('Cooking Basics');
    expect(outline?.lessons.map((l) => l.lessonNumber)).toEqual([1, 2, 3]);
  });
});
