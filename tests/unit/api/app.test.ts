import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../../../src/app.js';
import { DatabaseError } from '../../../src/domain/errors.js';
import { FakeAIAdapter, createTestContext, makeDays } from '../../helpers/fakes.js';
import type { AIAdapter } from '../../../src/infra/ai/AIAdapter.js';

const hanging = () => new FakeAIAdapter(() => new Promise<string>(() => undefined));

describe('HTTP routes', () => {
  let server: Server | null = null;
  let ctx: ReturnType<typeof createTestContext> | null = null;

  async function start(
    ai: AIAdapter,
    queueOptions?: { concurrency: number; maxPending: number }
  ): Promise<{ baseUrl: string; context: ReturnType<typeof createTestContext> }> {
    const context = createTestContext(ai, queueOptions);
    ctx = context;
    const app = createApp({
      env: { NODE_ENV: 'test' },
      db: context.db,
      jobService: context.jobService,
      jobOrchestrator: context.jobOrchestrator,
      queue: context.queue,
    });
    const listening = app.listen(0);
    server = listening;
    await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
    const address = listening.address();
    if (!address || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    return { baseUrl: `http://127.0.0.1:${address.port}`, context };
  }

  function submit(baseUrl: string, fields: Record<string, string>): Promise<Response> {
    return fetch(`${baseUrl}/generate`, {
      method: 'POST',
      body: new URLSearchParams(fields),
      redirect: 'manual',
    });
  }

  afterEach(async () => {
    const current = server;
    server = null;
    if (current) {
      current.closeAllConnections();
      await new Promise<void>((resolve) => current.close(() => resolve()));
    }
    ctx?.db.close();
    ctx = null;
  });

  it('GET /health returns a fixed payload', async () => {
    const { baseUrl } = await start(hanging());

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'healthy' });
  });

  it('GET /ready reports queue stats', async () => {
    const { baseUrl } = await start(hanging());

    const res = await fetch(`${baseUrl}/ready`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'ready',
      queue: { active: 0, pending: 0, concurrency: 2, maxPending: 10 },
    });
  });

  it('GET / serves the form', async () => {
    const { baseUrl } = await start(hanging());

    const res = await fetch(`${baseUrl}/`);
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<form class="card" method="post" action="/generate">');
  });

  it('GET /generate redirects to the form', async () => {
    const { baseUrl } = await start(hanging());

    const res = await fetch(`${baseUrl}/generate`, { redirect: 'manual' });

    expect(res.status).toBe(302);
    expect(res.headers.get('location')).toBe('/');
  });

  it('POST /generate redirects to the status page and completes the job', async () => {
    const { baseUrl, context } = await start(
      FakeAIAdapter.replying(`Here is your plan:\n${JSON.stringify(makeDays(3))}`)
    );

    const res = await submit(baseUrl, { destination: 'Paris', durationDays: '3' });

    expect(res.status).toBe(302);
    const location = res.headers.get('location') ?? '';
    expect(location).toMatch(/^\/itineraries\/[0-9a-f-]{36}$/);

    await context.queue.onIdle();
    const page = await fetch(`${baseUrl}${location}`);
    const html = await page.text();

    expect(page.status).toBe(200);
    expect(html).toContain('<h1>3-day itinerary for Paris</h1>');
    expect(html).toContain('<h2>Day 1: Theme 1</h2>');
    expect(html).toContain('<h2>Day 3: Theme 3</h2>');
    expect(html).toContain('<span class="location">Place 2</span>');
  });

  it('POST /generate renders a validation error with HTTP 200 and creates no job', async () => {
    const { baseUrl, context } = await start(hanging());
    const createSpy = vi.spyOn(context.jobService, 'createJob');

    const res = await submit(baseUrl, { destination: 'Paris', durationDays: '45' });
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(html).toContain('<h1>Invalid Duration</h1>');
    expect(html).toContain('<p>Please enter a valid number between 1 and 30</p>');
    expect(createSpy).not.toHaveBeenCalled();
  });

  it('POST /generate accepts a JSON body with a numeric duration', async () => {
    const { baseUrl } = await start(hanging());

    const res = await fetch(`${baseUrl}/generate`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ destination: 'Paris', durationDays: 3 }),
      redirect: 'manual',
    });

    expect(res.status).toBe(302);
    expect(res.headers.get('location')).toMatch(/^\/itineraries\/[0-9a-f-]{36}$/);
  });

  it('POST /generate reports missing fields', async () => {
    const { baseUrl } = await start(hanging());

    const res = await submit(baseUrl, { durationDays: '3' });

    expect(res.status).toBe(200);
    expect(await res.text()).toContain('<h1>Missing Information</h1>');
  });

  it('POST /generate answers 503 when the queue is full', async () => {
    const { baseUrl } = await start(hanging(), { concurrency: 1, maxPending: 0 });

    const first = await submit(baseUrl, { destination: 'Paris', durationDays: '2' });
    const second = await submit(baseUrl, { destination: 'Rome', durationDays: '2' });

    expect(first.status).toBe(302);
    expect(second.status).toBe(503);
    expect(await second.text()).toContain('<h1>Service Busy</h1>');
  });

  it('shows the processing view while generation is in flight', async () => {
    const { baseUrl, context } = await start(hanging());
    const job = context.jobOrchestrator.startItineraryJob({ destination: 'Rome', durationDays: 2 });

    const res = await fetch(`${baseUrl}/itineraries/${job.jobId}`);
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(html).toContain('<meta http-equiv="refresh" content="5"/>');
    expect(html).toContain('<p>Planning 2 days in Rome.</p>');
  });

  it('shows the failure view with the stored error', async () => {
    const { baseUrl, context } = await start(FakeAIAdapter.replying('no itinerary today'));
    const job = context.jobOrchestrator.startItineraryJob({ destination: 'Rome', durationDays: 2 });
    await context.queue.onIdle();

    const res = await fetch(`${baseUrl}/itineraries/${job.jobId}`);
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(html).toContain('<h1>Generation Failed</h1>');
    expect(html).toContain('<p>Failed to parse itinerary data</p>');
  });

  it('answers 404 for an unknown job', async () => {
    const { baseUrl } = await start(hanging());

    const res = await fetch(`${baseUrl}/itineraries/unknown`);
    const html = await res.text();

    expect(res.status).toBe(404);
    expect(html).toContain('<h1>Itinerary Not Found</h1>');
    expect(html).toContain('<p>No itinerary found with ID: unknown</p>');
  });

  it('answers 500 when the store fails', async () => {
    const { baseUrl, context } = await start(hanging());
    vi.spyOn(context.jobService, 'getJob').mockImplementation(() => {
      throw new DatabaseError('Job store queryOne failed');
    });

    const res = await fetch(`${baseUrl}/itineraries/any`);
    const html = await res.text();

    expect(res.status).toBe(500);
    expect(html).toContain('<h1>Server Error</h1>');
    expect(html).toContain('<p>An unexpected error occurred while processing your request</p>');
  });

  it('GET /api/itineraries/:jobId returns the job document', async () => {
    const { baseUrl, context } = await start(FakeAIAdapter.replying(JSON.stringify(makeDays(1))));
    const job = context.jobOrchestrator.startItineraryJob({ destination: 'Oslo', durationDays: 1 });
    await context.queue.onIdle();

    const res = await fetch(`${baseUrl}/api/itineraries/${job.jobId}`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({
      jobId: job.jobId,
      status: 'completed',
      destination: 'Oslo',
      durationDays: 1,
      createdAt: job.createdAt.toISOString(),
      completedAt: expect.any(String),
      itinerary: makeDays(1),
      error: null,
    });
  });

  it('GET /api/itineraries/:jobId answers 404 JSON for an unknown job', async () => {
    const { baseUrl } = await start(hanging());

    const res = await fetch(`${baseUrl}/api/itineraries/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: 'NOT_FOUND',
      message: 'Itinerary with id nope not found',
      details: { resource: 'Itinerary', id: 'nope' },
    });
  });

  it('renders a 404 page for unknown routes', async () => {
    const { baseUrl } = await start(hanging());

    const res = await fetch(`${baseUrl}/nowhere`);

    expect(res.status).toBe(404);
    expect(await res.text()).toContain('<h1>Page Not Found</h1>');
  });
});
