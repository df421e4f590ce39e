import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { TelegramClient } from '../../adapters/telegram/client';
import type { PatientService } from '../../domain/patients/service';
import { createAuthHook } from '../middleware/auth';

export interface AdminRouteDeps {
  apiSecretKey: string;
  patients: Pick<
    PatientService,
    'registerPatient' | 'registerProvider' | 'assignProvider' | 'issueVerificationCode'
  >;
  telegram?: Pick<TelegramClient, 'setWebhook'>;
  webhookSecret?: string;
}

const patientSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().email(),
  condition: z.string().max(200).nullish(),
  timezone: z.string().optional(),
  preferredTime: z.string().nullish(),
  providerIds: z.array(z.string().uuid()).optional(),
});

const providerSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().email(),
  specialty: z.string().max(200).nullish(),
  licenseNumber: z.string().max(100).nullish(),
  institution: z.string().max(200).nullish(),
});

const assignmentSchema = z.object({
  providerId: z.string().uuid(),
  patientId: z.string().uuid(),
});

const webhookSchema = z.object({
  url: z.string().url(),
});

export function adminRoutes(deps: AdminRouteDeps): FastifyPluginAsync {
  return async (app: FastifyInstance) => {
    // Apply auth to all admin routes
    app.addHook('preHandler', createAuthHook(deps.apiSecretKey));

    // ============================================================================
    // Registration
    // ============================================================================

    app.post('/patients', async (request, reply) => {
      const body = patientSchema.parse(request.body);
      const patient = await deps.patients.registerPatient(body);

      request.log.info({ patientId: patient.id }, 'Patient registered');
      reply.status(201);
      return { success: true, data: patient };
    });

    app.post('/providers', async (request, reply) => {
      const body = providerSchema.parse(request.body);
      const provider = await deps.patients.registerProvider(body);

      request.log.info({ providerId: provider.id }, 'Provider registered');
      reply.status(201);
      return { success: true, data: provider };
    });

    app.post('/assignments', async (request, reply) => {
      const { providerId, patientId } = assignmentSchema.parse(request.body);
      await deps.patients.assignProvider(providerId, patientId);

      reply.status(201);
      return { success: true, data: { providerId, patientId } };
    });

    // ============================================================================
    // Channel linking
    // ============================================================================

    app.post('/users/:userId/verification-code', async (request) => {
      const { userId } = z.object({ userId: z.string().uuid() }).parse(request.params);
      const issued = await deps.patients.issueVerificationCode(userId);
      return { success: true, data: issued };
    });

    const telegram = deps.telegram;
    if (telegram) {
      app.post('/telegram/webhook', async (request) => {
        const { url } = webhookSchema.parse(request.body);
        await telegram.setWebhook(url, deps.webhookSecret);
        return { success: true, message: `Webhook set to ${url}` };
      });
    }
  };
}
