// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const VECTORS_COURSE = `Course Title: Intro to Vectors
Course Link: https://example.com/vectors
Course Instructor: Ada Example

Lesson 0: What Is a Vector
Lesson Link: https://example.com/vectors/0
A vector is an ordered list of numbers. Vectors describe magnitude and direction.

Lesson 1: Vector Operations
Lesson Link: https://example.com/vectors/1
Vectors can be added component by component. The dot product multiplies matching components and sums them.
`;

export const COOKING_COURSE = `Course Title: Cooking Basics
Course Link: https://example.com/cooking
Course Instructor: Sam Sample

Lesson 1: Knife Skills
Knives should stay sharp. Sharp knives cut cleanly.

Lesson 2: Heat Control
Lesson Link: https://example.com/cooking/2
Heat the pan before adding oil. Oil spreads evenly when warm.

Lesson 3: Wrap-up
`;

export const MALFORMED_COURSE = `Course Title: Broken Course
Course Instructor: Nobody

Lesson 1: Missing link header
Some text here.
`;

/**
 * Create a temporary directory; remove it with `removeTempDir`.
 */
export function makeTempDir(prefix = 'coursemate-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write course documents into a folder and return its path.
 */
export function writeCourseFolder(root: string, files: Record<string, string>): string {
  const folder = path.join(root, 'docs');
  fs.mkdirSync(folder, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(folder, name), content, 'utf-8');
  }
  return folder;
}
