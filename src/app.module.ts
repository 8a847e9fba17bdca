import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { knowledgeConfig } from './config/knowledge.config';
import { HealthModule } from './health/health.module';
import { IngestionModule } from './ingestion/ingestion.module';
import { SearchModule } from './search/search.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [knowledgeConfig],
    }),
    IngestionModule,
    SearchModule,
    HealthModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule { }
