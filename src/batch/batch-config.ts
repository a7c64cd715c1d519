import { z } from 'zod';
import { REQUIRED_JOB_FIELDS } from '../constants';
import { InvalidFieldError, MissingFieldError } from '../errors';
import { TrimJob } from '../trim/trim-job.interface';

export type BatchDocumentShape = 'array' | 'single' | 'named';

export interface JobCandidate {
  label: string; // "#2", or "#2 (intro)" for named jobs
  value: unknown;
}

export interface NormalizedBatch {
  shape: BatchDocumentShape;
  candidates: JobCandidate[];
}

const trimJobSchema = z.object({
  source: z.string(),
  in: z.string(),
  out: z.string(),
  output: z.string(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasAllJobFields(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && REQUIRED_JOB_FIELDS.every((field) => field in value);
}

/**
 * Accepts an array of jobs, a single job object, or an object of named jobs.
 * Array elements are all kept so that malformed ones can be reported by
 * index; in a named map only values carrying every job field are taken.
 */
export function normalizeBatchDocument(document: unknown): NormalizedBatch {
  if (Array.isArray(document)) {
    return {
      shape: 'array',
      candidates: document.map((value, index) => ({ label: `#${index + 1}`, value })),
    };
  }

  if (hasAllJobFields(document)) {
    return { shape: 'single', candidates: [{ label: '#1', value: document }] };
  }

  const candidates: JobCandidate[] = [];
  if (isRecord(document)) {
    for (const [name, value] of Object.entries(document)) {
      if (hasAllJobFields(value)) {
        candidates.push({ label: `#${candidates.length + 1} (${name})`, value });
      }
    }
  }
  return { shape: 'named', candidates };
}

/**
 * Turn a candidate into a TrimJob, or throw MissingFieldError /
 * InvalidFieldError naming the offending keys.
 */
export function validateJobCandidate(value: unknown): TrimJob {
  if (!isRecord(value)) {
    throw new MissingFieldError([...REQUIRED_JOB_FIELDS]);
  }

  const missing = REQUIRED_JOB_FIELDS.filter((field) => !(field in value));
  if (missing.length > 0) {
    throw new MissingFieldError(missing);
  }

  const result = trimJobSchema.safeParse(value);
  if (!result.success) {
    const invalid = [...new Set(result.error.issues.map((issue) => String(issue.path[0])))];
    throw new InvalidFieldError(invalid);
  }
  return result.data;
}
