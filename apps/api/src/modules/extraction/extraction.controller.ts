import { BadRequestException, Controller, Post, Req } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiConsumes, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { MultipartFields } from '@fastify/multipart';
import type { FastifyRequest } from 'fastify';
import { extractionRequestSchema } from '@sheetstruct/shared';
import type { ClientDocument } from '@sheetstruct/shared';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { ExtractionService } from './extraction.service';

const identityPipe = new ZodValidationPipe(extractionRequestSchema);

@ApiTags('extractions')
@Controller('api/extractions')
export class ExtractionController {
  constructor(
    private readonly extractionService: ExtractionService,
    private readonly config: ConfigService,
  ) {}

  @Post()
  @ApiConsumes('multipart/form-data')
  @ApiOperation({
    summary: 'Extract a workbook',
    description:
      'Multipart upload: identity fields (client_id, country, client_name, product, extracted_date, is_latest, form_variant) followed by the `file` part.',
  })
  @ApiResponse({ status: 201, description: 'Structured document' })
  @ApiResponse({ status: 400, description: 'No file provided' })
  @ApiResponse({ status: 422, description: 'Invalid identity fields or corrupted workbook' })
  @ApiResponse({ status: 504, description: 'Extraction timed out' })
  async extract(@Req() request: FastifyRequest): Promise<ClientDocument> {
    const file = await request.file();
    if (!file) {
      throw new BadRequestException('No file provided');
    }

    const identity = identityPipe.transform(fieldValues(file.fields));
    const buffer = await file.toBuffer();
    const timeoutMs = this.config.get<number>('EXTRACTION_TIMEOUT_MS') ?? 120_000;

    return this.extractionService.extractBuffer(buffer, file.filename, identity, {
      signal: AbortSignal.timeout(timeoutMs),
    });
  }
}

/** Plain text fields of a multipart request; file parts are ignored */
function fieldValues(fields: MultipartFields): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [name, entry] of Object.entries(fields)) {
    const part = Array.isArray(entry) ? entry[0] : entry;
    if (part?.type === 'field') values[name] = part.value;
  }
  return values;
}
