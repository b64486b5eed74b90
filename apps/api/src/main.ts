import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import multipart from '@fastify/multipart';
import { AppModule } from './app.module';
import { validateEnv } from './config/env.config';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { ResponseTransformInterceptor } from './common/interceptors/response-transform.interceptor';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const env = validateEnv();

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: false }),
  );

  await app.register(multipart as never, {
    limits: { fileSize: env.MAX_UPLOAD_SIZE_MB * 1024 * 1024, files: 1 },
  });

  app.useGlobalFilters(new GlobalExceptionFilter());
  app.useGlobalInterceptors(new ResponseTransformInterceptor());

  // Swagger UI needs @fastify/static; development only
  if (env.NODE_ENV !== 'production') {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('SheetStruct API')
      .setDescription('Structural extraction of spreadsheet workbooks into typed JSON documents.')
      .setVersion('1.0.0')
      .addTag('extractions', 'Upload a workbook with its client identity and receive the structured document')
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('api/docs', app, document);
  }

  // Health check sits outside the response envelope
  const fastifyInstance = app.getHttpAdapter().getInstance();
  fastifyInstance.get('/api/health', (_req: unknown, reply: { send: (body: unknown) => void }) => {
    reply.send({ status: 'ok' });
  });

  await app.listen(env.PORT, '0.0.0.0');
  logger.log(`SheetStruct API running on http://localhost:${env.PORT}`);
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed:', err);
  process.exit(1);
});
