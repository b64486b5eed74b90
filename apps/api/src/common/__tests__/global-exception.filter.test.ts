import { describe, it, expect } from 'vitest';
import { BadRequestException } from '@nestjs/common';
import { ZodError, z } from 'zod';
import { extractionRequestSchema } from '@sheetstruct/shared';
import { GlobalExceptionFilter } from '../filters/global-exception.filter';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import { ExtractionError } from '../../modules/extraction/extraction.errors';

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('GlobalExceptionFilter', () => {
  const filter = new GlobalExceptionFilter();

  it('maps extraction failures by kind', () => {
    expect(filter.toErrorBody(ExtractionError.corrupted('Workbook a.xlsx is corrupted'))).toEqual({
      status: 422,
      code: 'WORKBOOK_CORRUPTED',
      message: 'Workbook a.xlsx is corrupted',
    });
    expect(filter.toErrorBody(ExtractionError.timeout('Extraction timed out'))).toMatchObject({
      status: 504,
      code: 'EXTRACTION_TIMEOUT',
    });
    expect(filter.toErrorBody(ExtractionError.other('Cannot read file'))).toMatchObject({
      status: 500,
      code: 'EXTRACTION_FAILED',
    });
  });

  it('keeps the status and message of HTTP exceptions', () => {
    expect(filter.toErrorBody(new BadRequestException('No file provided'))).toEqual({
      status: 400,
      code: 'Bad Request',
      message: 'No file provided',
    });
  });

  it('passes validation details through', () => {
    const pipe = new ZodValidationPipe(extractionRequestSchema);
    const error = caught(() => pipe.transform({ extracted_date: 'not-a-date' }));

    expect(filter.toErrorBody(error)).toEqual({
      status: 422,
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: [{ path: 'extracted_date', message: 'Invalid date' }],
    });
  });

  it('renders zod errors as validation failures', () => {
    const result = z.object({ n: z.number() }).safeParse({ n: 'x' });
    const error = result.success ? undefined : result.error;

    expect(error).toBeInstanceOf(ZodError);
    expect(filter.toErrorBody(error)).toMatchObject({ status: 422, code: 'VALIDATION_ERROR' });
  });

  it('falls back to a 500 for unknown errors', () => {
    expect(filter.toErrorBody(new Error('boom'))).toEqual({ status: 500, code: 'INTERNAL_ERROR', message: 'boom' });
    expect(filter.toErrorBody('thrown string')).toEqual({
      status: 500,
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
});

describe('ZodValidationPipe', () => {
  it('returns the parsed identity', () => {
    const pipe = new ZodValidationPipe(extractionRequestSchema);

    expect(pipe.transform({ country: ' US ', client_name: '', is_latest: 'true' })).toEqual({
      country: 'US',
      client_name: null,
      product: null,
      extracted_date: null,
      is_latest: true,
      form_variant: null,
    });
  });
});
