// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Input schemas for the course tools.
 * Models occasionally send numbers as strings or optional fields as null;
 * both are accepted.
 */

import { z } from 'zod';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const lessonNumber = z
  .union([
    z.number().int().nonnegative(),
    z.string().regex(/^\s*\d+\s*$/, 'must be a whole number').transform((value) => parseInt(value, 10)),
  ])
  .nullish()
  .transform((value) => value ?? undefined);

export const SearchCourseContentSchema = z.object({
  query: z.string({ required_error: 'query is required' }).trim().min(1, 'query must not be empty'),
  course_name: optionalText,
  lesson_number: lessonNumber,
});

export const CourseOutlineSchema = z.object({
  course_name: z.string({ required_error: 'course_name is required' }).trim().min(1, 'course_name must not be empty'),
});

export const ListCoursesSchema = z.object({});

export type SearchCourseContentInput = z.infer<typeof SearchCourseContentSchema>;
export type CourseOutlineInput = z.infer<typeof CourseOutlineSchema>;
export type ListCoursesInput = z.infer<typeof ListCoursesSchema>;
