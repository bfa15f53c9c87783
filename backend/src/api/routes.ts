import type { FastifyPluginAsync } from 'fastify';
import type { AppContext } from '../context.js';
import {
  REQUIRED_FIELDS,
  formatModelLabel,
  registerPrognosisRoutes,
} from '../modules/prognosis/index.js';

export const APP_NAME = 'Oncology Prognosis API';
export const APP_VERSION = '1.0.0';

const ENDPOINTS: Record<string, string> = {
  'GET /': 'API information',
  'GET /health': 'Health check',
  'POST /predict/survival': 'Predict 5-year survival',
  'POST /predict/drug-response': 'Predict drug response',
  'GET /cancer-types': 'Supported cancer types',
  'GET /stages': 'Cancer stages',
  'GET /treatments': 'Treatment options',
  'GET /grades': 'Tumour grades',
  'GET /performance-statuses': 'Performance status levels',
};

/**
 * Root routes: service metadata, health, and the prognosis module
 */
export const registerRoutes: FastifyPluginAsync<{ context: AppContext }> = async (app, opts) => {
  const { models, predictor } = opts.context;

  app.get('/', async () => ({
    name: APP_NAME,
    version: APP_VERSION,
    description: 'Cancer survival and drug-response predictions from pre-trained classifiers',
    endpoints: ENDPOINTS,
    required_fields: REQUIRED_FIELDS,
  }));

  app.get('/health', async (_request, reply) => {
    if (!models.isReady()) {
      const loadError = models.getLoadError();
      return reply.status(503).send({
        status: 'unhealthy',
        models_loaded: false,
        state: models.getState(),
        ...(loadError ? { error: loadError.message } : {}),
      });
    }

    return {
      status: 'healthy',
      models_loaded: true,
      survival_model: formatModelLabel(models.getInfo('survival')),
      drug_model: formatModelLabel(models.getInfo('drug-response')),
    };
  });

  await registerPrognosisRoutes(app, { models, predictor });
};
