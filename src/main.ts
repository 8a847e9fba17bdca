import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { knowledgeConfig, KnowledgeConfig } from './config/knowledge.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(app, new DocumentBuilder()
    .setTitle('Knowledge Ingest')
    .setDescription('Search over ingested document chunks')
    .setVersion('0.1.0')
    .build());
  SwaggerModule.setup('docs', app, document);

  const config = app.get<KnowledgeConfig>(knowledgeConfig.KEY);
  await app.listen(config.http.port);
  Logger.log(`Listening on port ${config.http.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
