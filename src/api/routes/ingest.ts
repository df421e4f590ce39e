import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { QueueClient } from '../../infra/queue/client';
import { BadRequestError, UnauthorizedError } from '../../shared/errors';
import type { InboundJobData } from '../../shared/types';

export const TELEGRAM_SECRET_HEADER = 'x-telegram-bot-api-secret-token';

// Only the fields the router reads; Telegram sends many more
const telegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: z.object({
    message_id: z.number().int(),
    date: z.number().int(),
    chat: z.object({
      id: z.number().int(),
      type: z.string(),
    }),
    from: z.object({
      id: z.number().int(),
      first_name: z.string().optional(),
      username: z.string().optional(),
    }).optional(),
    text: z.string().optional(),
  }).optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

export interface IngestDeps {
  queue: Pick<QueueClient, 'addInboundJob'>;
  webhookSecret?: string;
}

export function ingestRoutes(deps: IngestDeps): FastifyPluginAsync {
  return async (app: FastifyInstance) => {
    app.post('/ingest/telegram', async (request, reply) => {
      const correlationId = request.correlationId;

      if (deps.webhookSecret && request.headers[TELEGRAM_SECRET_HEADER] !== deps.webhookSecret) {
        throw new UnauthorizedError('Invalid webhook secret');
      }

      const parseResult = telegramUpdateSchema.safeParse(request.body);
      if (!parseResult.success) {
        throw new BadRequestError(`Invalid webhook payload: ${parseResult.error.message}`);
      }

      const update = parseResult.data;
      const message = update.message;

      // Edits, stickers, photos and the rest carry no text for the router
      if (!message || !message.text) {
        request.log.debug({ updateId: update.update_id }, 'Ignoring non-text update');
        return {
          success: true,
          correlationId,
          action: 'ignored',
          reason: 'Not a text message',
        };
      }

      const jobData: InboundJobData = {
        type: 'inbound_message',
        correlationId,
        chatId: String(message.chat.id),
        text: message.text,
        senderName: message.from?.first_name,
        timestamp: new Date(message.date * 1000).toISOString(),
      };

      // Telegram redelivers until it gets a 2xx; the update id keeps it to one job
      const jobId = await deps.queue.addInboundJob(jobData, `telegram-${update.update_id}`);

      request.log.info({ jobId, chatId: jobData.chatId }, 'Message queued');

      reply.status(202);
      return { success: true, correlationId, jobId };
    });
  };
}
