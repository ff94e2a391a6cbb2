/**
 * Compare API tests
 *
 * The app runs in-process on an ephemeral port with a fake PDF engine and
 * no narrator.
 */

import type { Server } from 'http';
import { DocumentTextSource, LocalGlossary } from '@quote-compare/shared';
import type {
  CompareResponse,
  ErrorEnvelope,
  GlossaryHit,
  IngestionReport,
  QuoteRecord,
} from '@quote-compare/shared';
import { createApp } from '../../services/compare-api/src/app';
import { FakeOcrEngine, FakePdfLoader, baseUrlOf, readJson } from './helpers';

const GOLD_TEXT = `Gold Plan summary of benefits for the whole family
Annual Premium: $1,200
Deductible: $500
Coinsurance: 20%`;

const QUOTES = [
  {
    plan_name: 'Gold',
    premium: 1000,
    deductible: 500,
    coinsurance: 0.2,
    out_of_pocket_max: 3000,
    coverage_limit: 1000000,
    network_size: 2000,
  },
  {
    plan_name: 'Silver',
    premium: 2000,
    deductible: 0,
    coinsurance: 10,
    out_of_pocket_max: 2000,
    coverage_limit: 500000,
    network_size: 4000,
  },
];

describe('Compare API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll((done) => {
    const app = createApp({
      reader: new DocumentTextSource(new FakePdfLoader({ gold: [{ text: GOLD_TEXT }] }), new FakeOcrEngine()),
      narrator: null,
      glossary: new LocalGlossary([
        { term: 'Deductible', definition: 'The deductible is what you pay before the plan pays.' },
      ]),
    });
    server = app.listen(0, () => {
      baseUrl = baseUrlOf(server);
      done();
    });
  });

  afterAll((done) => {
    server.close(() => done());
  });

  function post(path: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  }

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await readJson<Record<string, unknown>>(response);

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy', service: 'compare-api', narrator: null, field_rules: 6 });
    expect(response.headers.get('x-correlation-id')).toBeTruthy();
  });

  it('should echo a caller correlation ID', async () => {
    const response = await fetch(`${baseUrl}/health`, { headers: { 'X-Correlation-Id': 'test-correlation-id' } });

    expect(response.headers.get('x-correlation-id')).toBe('test-correlation-id');
  });

  it('should rank quotes and explain the ranking', async () => {
    const response = await post('/compare', { quotes: QUOTES, expected_claims: 2, avg_claim_amount: 5000 });
    const body = await readJson<CompareResponse>(response);

    expect(response.status).toBe(200);
    expect(body.ranked.map((row) => row.plan_name)).toEqual(['Gold', 'Silver']);
    expect(body.ranked[0].composite_score).toBe(0.928);
    expect(body.ranked[1].coinsurance).toBe(0.1);
    expect(body.markdown.split('\n')).toHaveLength(4);
    expect(body.explanation_source).toBe('local');
    expect(body.explanation).toContain('**Gold** is the most suitable option for a middle income family of 4.');
  });

  it('should apply caller weights and profile', async () => {
    const response = await post('/compare', {
      quotes: QUOTES,
      expected_claims: 2,
      avg_claim_amount: 5000,
      weights: { cost: 0, coverage: 0, network: 1 },
      profile: { income_level: 'Low', family_size: 2 },
    });
    const body = await readJson<CompareResponse>(response);

    expect(body.ranked[0].plan_name).toBe('Silver');
    expect(body.explanation).toContain('for a low income family of 2.');
  });

  it('should refuse an empty batch', async () => {
    const correlationId = 'test-empty-batch';
    const response = await post('/compare', { quotes: [] }, { 'X-Correlation-Id': correlationId });
    const body = await readJson<ErrorEnvelope>(response);

    expect(response.status).toBe(400);
    expect(body).toEqual({
      error: {
        code: 'empty_batch',
        message: 'At least one quote is required for ranking',
        correlation_id: correlationId,
      },
    });
  });

  it('should reject an invalid compare request', async () => {
    const response = await post('/compare', { quotes: QUOTES, weights: { cost: -1 } });
    const body = await readJson<ErrorEnvelope>(response);

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('validation_failed');
  });

  it('should reject a malformed JSON body', async () => {
    const response = await fetch(`${baseUrl}/compare`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"quotes": [',
    });
    const body = await readJson<ErrorEnvelope>(response);

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('invalid_request');
  });

  it('should extract quotes from documents and report each one', async () => {
    const response = await post('/quotes/extract', {
      documents: [
        { name: 'Gold.pdf', content_base64: Buffer.from('gold').toString('base64') },
        { name: 'Broken.pdf', content_base64: Buffer.from('garbage').toString('base64') },
      ],
    });
    const body = await readJson<IngestionReport>(response);

    expect(response.status).toBe(200);
    expect(body.quotes).toEqual([
      { plan_name: 'Gold', premium: 1200, deductible: 500, coinsurance: 0.2, out_of_pocket_max: 0 },
    ]);
    expect(body.documents.map((d) => d.status)).toEqual(['extracted', 'failed']);
  });

  it('should parse a tabular file', async () => {
    const content = 'plan,premium,deductible\nGold,1200,500\n';
    const response = await post('/quotes/parse', {
      filename: 'quotes.csv',
      content_base64: Buffer.from(content).toString('base64'),
    });
    const body = await readJson<{ quotes: QuoteRecord[] }>(response);

    expect(response.status).toBe(200);
    expect(body.quotes).toEqual([
      { plan_name: 'Gold', premium: 1200, deductible: 500, coinsurance: 0.2, out_of_pocket_max: 0 },
    ]);
  });

  it('should answer 415 for an unsupported tabular format', async () => {
    const response = await post('/quotes/parse', { filename: 'quotes.xls', content_base64: '' });
    const body = await readJson<ErrorEnvelope>(response);

    expect(response.status).toBe(415);
    expect(body.error.code).toBe('unsupported_format');
  });

  it('should answer 422 for an unreadable tabular file', async () => {
    const response = await post('/quotes/parse', {
      filename: 'quotes.json',
      content_base64: Buffer.from('{oops').toString('base64'),
    });

    expect(response.status).toBe(422);
  });

  it('should answer glossary questions', async () => {
    const response = await fetch(`${baseUrl}/glossary?q=${encodeURIComponent('What is a deductible?')}`);
    const body = await readJson<{ answer: string; hits: GlossaryHit[] }>(response);

    expect(body.answer).toBe('The deductible is what you pay before the plan pays.');
    expect(body.hits).toHaveLength(1);
    expect(body.hits[0].term).toBe('Deductible');
  });

  it('should expose metrics', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    const text = await response.text();

    expect(response.status).toBe(200);
    expect(text).toContain('quote_compare_http_requests_total');
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/nowhere`);
    const body = await readJson<ErrorEnvelope>(response);

    expect(response.status).toBe(404);
    expect(body.error.code).toBe('not_found');
  });
});
