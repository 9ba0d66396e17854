/**
 * @file Loads and validates link patch lists from JSON files.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { LinkPatch } from '../types';
import { getErrorMessage, PatchFileError } from '../utils/error-handling';

const cellValueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

// Key fields stay optional here: a patch without them is skipped with a warning by the editor.
const linkPatchSchema = z
  .object({
    from_node_id: z.number().int().nullable().optional(),
    to_node_id: z.number().int().nullable().optional(),
  })
  .catchall(cellValueSchema);

export const linkPatchListSchema = z.array(linkPatchSchema);

export function parsePatches(data: unknown, source = '<memory>'): LinkPatch[] {
  const result = linkPatchListSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new PatchFileError(source, 'expected an array of link patch objects', issues);
  }
  return result.data;
}

export function loadPatches(filePath: string): LinkPatch[] {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new PatchFileError(filePath, getErrorMessage(error));
  }
  return parsePatches(data, filePath);
}
