import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { createAppContext, type AppContext } from '../context.js';
import {
  DRUG_RESPONSE_SOURCE,
  EXAMPLE_PAYLOAD,
  SURVIVAL_SOURCE,
  memoryReader,
  stubLogger,
  survivalArtifact,
  testArtifacts,
  testEnv,
} from './fixtures.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('Prognosis API', () => {
  let context: AppContext;
  let app: FastifyInstance;

  function setup(artifacts: Record<string, unknown> = testArtifacts) {
    context = createAppContext(testEnv, stubLogger(), { reader: memoryReader(artifacts) });
    app = buildApp(context);
  }

  afterEach(async () => {
    await app.close();
  });

  describe('before models are loaded', () => {
    beforeEach(() => setup());

    it('GET /health reports unhealthy', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({ status: 'unhealthy', models_loaded: false, state: 'idle' });
    });

    it('POST /predict/survival answers MODEL_NOT_READY', async () => {
      const res = await app.inject({ method: 'POST', url: '/predict/survival', payload: EXAMPLE_PAYLOAD });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({
        ok: false,
        error: 'MODEL_NOT_READY',
        message: 'Models are not loaded (state: idle)',
        state: 'idle',
      });
    });

    it('still validates the payload first', async () => {
      const res = await app.inject({ method: 'POST', url: '/predict/drug-response', payload: {} });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });
  });

  describe('after a failed load', () => {
    beforeEach(async () => {
      setup({ [SURVIVAL_SOURCE]: survivalArtifact });
      await expect(context.models.load()).rejects.toThrow('file not found');
    });

    it('GET /health reports the load error', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({
        status: 'unhealthy',
        models_loaded: false,
        state: 'failed',
        error: `Failed to load model from ${DRUG_RESPONSE_SOURCE}: file not found`,
      });
    });

    it('serves no predictions, even from the model that did load', async () => {
      const res = await app.inject({ method: 'POST', url: '/predict/survival', payload: EXAMPLE_PAYLOAD });

      expect(res.statusCode).toBe(503);
      expect(res.json().message).toBe('Models are not loaded (state: failed)');
    });
  });

  describe('with models loaded', () => {
    beforeEach(async () => {
      setup();
      await context.models.load();
    });

    it('GET / describes the service', async () => {
      const res = await app.inject({ method: 'GET', url: '/' });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.name).toBe('Oncology Prognosis API');
      expect(body.version).toBe('1.0.0');
      expect(body.endpoints['POST /predict/survival']).toBe('Predict 5-year survival');
      expect(body.required_fields).toEqual([
        'age',
        'sex',
        'cancer_type',
        'stage',
        'grade',
        'tumor_size_cm',
        'treatment',
        'performance_status',
      ]);
    });

    it('GET /health reports both models', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        status: 'healthy',
        models_loaded: true,
        survival_model: 'Survival Test Forest (85.0% accuracy)',
        drug_model: 'Drug Response Test Forest (80.0% accuracy)',
      });
    });

    it('POST /predict/survival returns the prediction, patient echo and model summary', async () => {
      const res = await app.inject({ method: 'POST', url: '/predict/survival', payload: EXAMPLE_PAYLOAD });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.prediction.survived).toBe(true);
      expect(body.prediction.survival_probability).toBeCloseTo(0.95, 10);
      expect(body.prediction.death_probability).toBeCloseTo(0.05, 10);
      expect(body.prediction.confidence).toBeCloseTo(0.95, 10);
      expect(body.prediction.risk_category).toBe('Low');
      expect(body.patient).toEqual({
        age: 58,
        sex: 'Female',
        cancer_type: 'Breast Cancer',
        stage: 'II',
        tumor_size_cm: 3.2,
      });
      expect(body.model).toEqual({
        name: 'Survival Test Forest',
        accuracy: '85.0%',
        cross_validation: '85.5% (±4.9%)',
      });
    });

    it('POST /predict/survival marks late-stage patients as high risk', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/predict/survival',
        payload: { ...EXAMPLE_PAYLOAD, stage: 'IV' },
      });
      const body = res.json();

      expect(body.prediction.survived).toBe(false);
      expect(body.prediction.survival_probability).toBeCloseTo(0.4, 10);
      expect(body.prediction.death_probability).toBeCloseTo(0.6, 10);
      expect(body.prediction.confidence).toBeCloseTo(0.6, 10);
      expect(body.prediction.risk_category).toBe('High');
    });

    it('POST /predict/drug-response returns the response type', async () => {
      const res = await app.inject({ method: 'POST', url: '/predict/drug-response', payload: EXAMPLE_PAYLOAD });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.prediction.response_type).toBe('Partial Response');
      expect(body.prediction.response_probability).toBeCloseTo(0.65, 10);
      expect(body.prediction.no_response_probability).toBeCloseTo(0.35, 10);
      expect(body.prediction.confidence).toBeCloseTo(0.65, 10);
      expect(body.patient).toEqual({
        cancer_type: 'Breast Cancer',
        stage: 'II',
        treatment: 'Surgery + Chemotherapy',
      });
      expect(body.model).toEqual({ name: 'Drug Response Test Forest', accuracy: '80.0%' });
    });

    it('ignores fields outside the patient record', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/predict/survival',
        payload: { ...EXAMPLE_PAYLOAD, patient_id: 'p-1' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().patient).not.toHaveProperty('patient_id');
    });

    it('lists missing fields', async () => {
      const { grade: _grade, treatment: _treatment, ...partial } = EXAMPLE_PAYLOAD;
      const res = await app.inject({ method: 'POST', url: '/predict/survival', payload: partial });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'Missing required fields',
        missing: ['grade', 'treatment'],
        invalid: [],
      });
    });

    it('rejects out-of-range numbers', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/predict/survival',
        payload: { ...EXAMPLE_PAYLOAD, tumor_size_cm: -1 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'Invalid field values',
        missing: [],
        invalid: [{ field: 'tumor_size_cm', message: 'Must be 0 or greater' }],
      });
    });

    it('rejects values outside the vocabulary', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/predict/drug-response',
        payload: { ...EXAMPLE_PAYLOAD, cancer_type: 'Brain Cancer' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'UNKNOWN_CATEGORY',
        message: "Unknown cancer_type 'Brain Cancer'",
        field: 'cancer_type',
        value: 'Brain Cancer',
        allowed: [
          'Breast Cancer',
          'Lung Cancer',
          'Prostate Cancer',
          'Colorectal Cancer',
          'Melanoma',
          'Pancreatic Cancer',
          'Leukemia',
          'Ovarian Cancer',
        ],
      });
    });

    it('answers malformed JSON with BAD_REQUEST', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/predict/survival',
        headers: { 'content-type': 'application/json' },
        payload: '{"age": 58,',
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().ok).toBe(false);
      expect(res.json().error).toBe('BAD_REQUEST');
    });
  });

  describe('vocabulary routes', () => {
    beforeEach(() => setup());

    it('serve the accepted values in display order', async () => {
      const cancerTypes = await app.inject({ method: 'GET', url: '/cancer-types' });
      const stages = await app.inject({ method: 'GET', url: '/stages' });
      const treatments = await app.inject({ method: 'GET', url: '/treatments' });
      const grades = await app.inject({ method: 'GET', url: '/grades' });
      const statuses = await app.inject({ method: 'GET', url: '/performance-statuses' });

      expect(cancerTypes.json().cancer_types).toHaveLength(8);
      expect(cancerTypes.json().cancer_types[0]).toBe('Breast Cancer');
      expect(stages.json()).toEqual({ stages: ['I', 'II', 'III', 'IV'] });
      expect(treatments.json().treatments).toEqual([
        'Surgery',
        'Chemotherapy',
        'Radiation',
        'Immunotherapy',
        'Surgery + Chemotherapy',
        'Surgery + Radiation',
        'Chemotherapy + Radiation',
        'Multimodal',
      ]);
      expect(grades.json()).toEqual({
        grades: [
          'Well Differentiated',
          'Moderately Differentiated',
          'Poorly Differentiated',
          'Undifferentiated',
        ],
      });
      expect(statuses.json()).toEqual({ performance_statuses: ['Excellent', 'Good', 'Fair', 'Poor'] });
    });

    it('do not depend on the models', async () => {
      const res = await app.inject({ method: 'GET', url: '/stages' });

      expect(context.models.getState()).toBe('idle');
      expect(res.statusCode).toBe(200);
    });
  });

  describe('plumbing', () => {
    beforeEach(() => setup());

    it('answers unknown routes with NOT_FOUND', async () => {
      const res = await app.inject({ method: 'GET', url: '/predict/mortality' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        ok: false,
        error: 'NOT_FOUND',
        message: 'Route GET /predict/mortality not found',
      });
    });

    it('tags every response with a request id', async () => {
      const res = await app.inject({ method: 'GET', url: '/stages' });

      expect(res.headers['x-request-id']).toMatch(UUID_PATTERN);
    });
  });
});
