import { Body, Controller, HttpStatus, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { formatSse, writeSse } from '../common/sse';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { ChatRequest, ChatRequestSchema } from './chat.schemas';
import { ChatService } from './chat.service';

@Controller('chat')
export class ChatController {
  constructor(private readonly chat: ChatService) {}

  @Post()
  async ask(
    @Body(new ZodValidationPipe(ChatRequestSchema)) body: ChatRequest,
    @Res() res: Response,
  ) {
    if (!body.stream) {
      const result = await this.chat.answer(body);
      res.status(HttpStatus.OK).json(result);
      return;
    }
    await this.relay(body, res);
  }

  private async relay(body: ChatRequest, res: Response) {
    res.status(HttpStatus.OK);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    // Client disconnect stops the relay and releases the upstream stream.
    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) abort.abort();
    });

    try {
      for await (const ev of this.chat.stream(body, abort.signal)) {
        if (abort.signal.aborted) break;
        await writeSse(res, formatSse(ev.event, ev.data));
      }
    } finally {
      if (!res.writableEnded) res.end();
    }
  }
}
