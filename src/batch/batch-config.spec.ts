import { InvalidFieldError, MissingFieldError } from '../errors';
import { normalizeBatchDocument, validateJobCandidate } from './batch-config';

const job = { source: 'a.mp4', in: '000000', out: '000010', output: '/tmp/a.mp4' };

describe('normalizeBatchDocument', () => {
  it('keeps every element of an array in order', () => {
    const second = { source: 'b.mp4' };
    const result = normalizeBatchDocument([job, second]);

    expect(result.shape).toBe('array');
    expect(result.candidates).toEqual([
      { label: '#1', value: job },
      { label: '#2', value: second },
    ]);
  });

  it('accepts a single job object', () => {
    const result = normalizeBatchDocument(job);

    expect(result.shape).toBe('single');
    expect(result.candidates).toEqual([{ label: '#1', value: job }]);
  });

  it('collects named jobs and ignores values that are not jobs', () => {
    const outro = { ...job, source: 'outro.mp4' };
    const result = normalizeBatchDocument({
      intro: job,
      notes: 'not a job',
      partial: { source: 'c.mp4', in: '000000' },
      outro,
    });

    expect(result.shape).toBe('named');
    expect(result.candidates).toEqual([
      { label: '#1 (intro)', value: job },
      { label: '#2 (outro)', value: outro },
    ]);
  });

  it.each([[[]], [{}], ['text'], [42], [null]])('yields no candidates for %p', (document) => {
    expect(normalizeBatchDocument(document).candidates).toHaveLength(0);
  });
});

describe('validateJobCandidate', () => {
  it('returns the four job fields', () => {
    expect(validateJobCandidate({ ...job, note: 'extra' })).toEqual(job);
  });

  it('names the missing fields', () => {
    expect(() => validateJobCandidate({ source: 'a.mp4', in: '000000' })).toThrow(
      new MissingFieldError(['out', 'output']),
    );
  });

  it('treats a non-object as missing every field', () => {
    expect(() => validateJobCandidate('a.mp4')).toThrow(
      'Missing required parameters: source, in, out, output',
    );
  });

  it('rejects fields that are not strings', () => {
    let caught: unknown;
    try {
      validateJobCandidate({ ...job, in: 0, out: null });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidFieldError);
    expect(caught).toMatchObject({ fields: ['in', 'out'] });
  });
});
