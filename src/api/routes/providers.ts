import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AlertEngine } from '../../domain/alerts/engine';
import type { DashboardService } from '../../domain/dashboard/service';
import { createAuthHook } from '../middleware/auth';

export interface ProviderRouteDeps {
  apiSecretKey: string;
  dashboard: Pick<DashboardService, 'listPatientsForProvider' | 'getPatientDetail'>;
  alerts: Pick<
    AlertEngine,
    'listPendingAlerts' | 'resolveAlert' | 'findDecliningPatients' | 'findPatientsMissingCheckins'
  >;
}

const providerParams = z.object({ providerId: z.string().uuid() });
const patientParams = providerParams.extend({ patientId: z.string().uuid() });
const alertParams = providerParams.extend({ alertId: z.string().uuid() });

const atRiskQuery = z.object({
  threshold: z.coerce.number().max(0).optional(),
  days: z.coerce.number().int().min(1).max(30).optional(),
});

/**
 * Provider dashboard reads and alert resolution, mounted under /api/providers.
 */
export function providerRoutes(deps: ProviderRouteDeps): FastifyPluginAsync {
  return async (app: FastifyInstance) => {
    app.addHook('preHandler', createAuthHook(deps.apiSecretKey));

    // ============================================================================
    // Patients
    // ============================================================================

    app.get('/:providerId/patients', async (request) => {
      const { providerId } = providerParams.parse(request.params);
      const patients = await deps.dashboard.listPatientsForProvider(providerId);
      return { success: true, data: patients };
    });

    app.get('/:providerId/patients/:patientId', async (request) => {
      const { providerId, patientId } = patientParams.parse(request.params);
      const detail = await deps.dashboard.getPatientDetail(providerId, patientId);
      return { success: true, data: detail };
    });

    // ============================================================================
    // Alerts
    // ============================================================================

    app.get('/:providerId/alerts', async (request) => {
      const { providerId } = providerParams.parse(request.params);
      const alerts = await deps.alerts.listPendingAlerts(providerId);
      return { success: true, data: alerts };
    });

    app.post('/:providerId/alerts/:alertId/resolve', async (request) => {
      const { providerId, alertId } = alertParams.parse(request.params);
      const alert = await deps.alerts.resolveAlert(alertId, providerId);

      request.log.info({ providerId, alertId }, 'Alert resolved from dashboard');
      return { success: true, data: alert };
    });

    app.get('/:providerId/at-risk', async (request) => {
      const { providerId } = providerParams.parse(request.params);
      const { threshold, days } = atRiskQuery.parse(request.query);

      const [declining, missingCheckins] = await Promise.all([
        deps.alerts.findDecliningPatients({ providerId, threshold }),
        deps.alerts.findPatientsMissingCheckins({ providerId, days }),
      ]);

      return { success: true, data: { declining, missingCheckins } };
    });
  };
}
