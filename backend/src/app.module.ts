import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ChatCompletionService } from './ai/completion.service';
import { QueryRewriterService } from './ai/query-rewriter.service';
import { ChatController } from './chat/chat.controller';
import { ChatService } from './chat/chat.service';
import { ServiceErrorFilter } from './common/service-error.filter';
import { SETTINGS, loadSettings } from './config/settings';
import { HealthController } from './health/health.controller';
import { RetrievalService } from './rag/retrieval.service';

@Module({
  controllers: [ChatController, HealthController],
  providers: [
    { provide: SETTINGS, useFactory: () => loadSettings() },
    { provide: APP_FILTER, useClass: ServiceErrorFilter },
    RetrievalService,
    ChatCompletionService,
    QueryRewriterService,
    ChatService,
  ],
})
export class AppModule {}
