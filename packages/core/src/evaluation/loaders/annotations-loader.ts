import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { formatZodIssues } from '../config.js';
import type { JsonValue } from '../types.js';
import { isJsonValue } from '../types.js';

const jsonValueSchema = z.custom<JsonValue>((value) => isJsonValue(value), {
  message: 'Expected a JSON value',
});

/**
 * One paper in an annotation file. Annotator bookkeeping (notes, dates, extraction metadata) is
 * allowed and ignored.
 */
export const annotatedPaperSchema = z
  .object({
    automated_extraction: jsonValueSchema.optional(),
    ground_truth: jsonValueSchema.optional(),
    notes: z.string().optional(),
    annotator: z.string().optional(),
    annotation_date: z.string().optional(),
  })
  .passthrough();

export const annotationFileSchema = z
  .object({
    _instructions: z.unknown().optional(),
    validation_papers: z.record(z.string(), annotatedPaperSchema),
  })
  .passthrough();

export interface AnnotatedPaper {
  readonly automated_extraction: JsonValue;
  /** `null` until an annotator fills it in. */
  readonly ground_truth: JsonValue;
  readonly annotator?: string;
  readonly notes?: string;
}

/**
 * Papers keyed by identifier, in file order.
 */
export interface AnnotationCorpus {
  readonly papers: ReadonlyMap<string, AnnotatedPaper>;
  readonly sources: readonly string[];
}

export function parseAnnotationFile(input: unknown, source: string): AnnotationCorpus {
  const result = annotationFileSchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid annotation file ${source}:\n${formatZodIssues(result.error)}`);
  }

  const papers = new Map<string, AnnotatedPaper>();
  for (const [paperId, paper] of Object.entries(result.data.validation_papers)) {
    papers.set(paperId, {
      automated_extraction: paper.automated_extraction ?? {},
      ground_truth: paper.ground_truth ?? null,
      annotator: nonEmpty(paper.annotator),
      notes: nonEmpty(paper.notes),
    });
  }

  return { papers, sources: [source] };
}

export async function loadAnnotationFile(filePath: string): Promise<AnnotationCorpus> {
  const resolvedPath = path.resolve(filePath);
  const raw = await readFile(resolvedPath, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not parse ${resolvedPath} as JSON: ${message}`);
  }
  return parseAnnotationFile(parsed, resolvedPath);
}

/**
 * Combine annotation files into one corpus. A paper id may appear in only one file.
 */
export function mergeAnnotationCorpora(corpora: readonly AnnotationCorpus[]): AnnotationCorpus {
  const papers = new Map<string, AnnotatedPaper>();
  const owners = new Map<string, string>();
  const sources: string[] = [];

  for (const corpus of corpora) {
    const source = corpus.sources.join(', ');
    sources.push(...corpus.sources);
    for (const [paperId, paper] of corpus.papers) {
      const owner = owners.get(paperId);
      if (owner !== undefined) {
        throw new Error(`Duplicate paper id '${paperId}' in ${source} (already defined in ${owner})`);
      }
      owners.set(paperId, source);
      papers.set(paperId, paper);
    }
  }

  return { papers, sources };
}

export async function loadAnnotationCorpus(filePaths: readonly string[]): Promise<AnnotationCorpus> {
  const corpora = await Promise.all(filePaths.map((filePath) => loadAnnotationFile(filePath)));
  return mergeAnnotationCorpora(corpora);
}

/**
 * Number of papers an annotator has filled in.
 */
export function countAnnotated(corpus: AnnotationCorpus): number {
  let annotated = 0;
  for (const paper of corpus.papers.values()) {
    if (paper.ground_truth !== null) {
      annotated += 1;
    }
  }
  return annotated;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}
