import { test, expect } from '@playwright/test';
import { MemoryDocumentStore } from '../support/memory-store';
import { startTestServer, type TestServer } from '../support/server';

function day(n: number): Date {
  return new Date(Date.UTC(2024, 1, n));
}

function titles(products: { title: string }[]): string[] {
  return products.map((product) => product.title);
}

test.describe('Featured products', () => {
  let server: TestServer;
  let API_URL: string;

  test.beforeAll(async () => {
    const store = new MemoryDocumentStore();
    store.seed('product', [
      { title: 'Featured 1', category: 'carte', tags: ['featured'], created_at: day(1) },
      { title: 'Recent 1', category: 'gadget', tags: [], created_at: day(4) },
      { title: 'Featured 2', category: 'gadget', tags: ['nintendo', 'featured'], created_at: day(2) },
      { title: 'Recent 2', category: 'gadget', tags: ['nintendo'], created_at: day(5) },
      { title: 'Recent 3', category: 'videogiochi', tags: [], created_at: day(6) },
      { title: 'Featured 3', category: 'videogiochi', tags: ['featured'], created_at: day(3) },
      { title: 'Recent 4', category: 'carte', tags: ['featured-soon'], created_at: day(7) },
      { title: 'Recent 5', category: 'carte', tags: [], created_at: day(8) },
      { title: 'Recent 6', category: 'gadget', tags: [], created_at: day(9) },
    ]);
    server = await startTestServer({ store });
    API_URL = server.baseUrl;
  });

  test.afterAll(async () => {
    await server.close();
  });

  test('should put featured products first and backfill with the newest', async ({ request }) => {
    const response = await request.get(`${API_URL}/api/featured?limit=8`);
    expect(response.ok()).toBeTruthy();

    expect(titles(await response.json())).toEqual([
      'Featured 1',
      'Featured 2',
      'Featured 3',
      'Recent 6',
      'Recent 5',
      'Recent 4',
      'Recent 3',
      'Recent 2',
    ]);
  });

  test('should default to eight products', async ({ request }) => {
    const response = await request.get(`${API_URL}/api/featured`);
    expect(await response.json()).toHaveLength(8);
  });

  test('should not backfill when enough products are featured', async ({ request }) => {
    const response = await request.get(`${API_URL}/api/featured?limit=2`);
    expect(titles(await response.json())).toEqual(['Featured 1', 'Featured 2']);
  });

  test('should stop at the catalog size', async ({ request }) => {
    const response = await request.get(`${API_URL}/api/featured?limit=12`);
    const products = await response.json();

    expect(products).toHaveLength(9);
    expect(titles(products).slice(3)).toEqual(['Recent 6', 'Recent 5', 'Recent 4', 'Recent 3', 'Recent 2', 'Recent 1']);
  });

  test('should shape featured products', async ({ request }) => {
    const response = await request.get(`${API_URL}/api/featured?limit=1`);
    const [product] = await response.json();

    expect(product.id).toMatch(/^[0-9a-f]{24}$/);
    expect(product).not.toHaveProperty('_id');
    expect(product.created_at).toBe('2024-02-01T00:00:00.000Z');
  });

  for (const limit of ['0', '13']) {
    test(`should reject limit=${limit}`, async ({ request }) => {
      const response = await request.get(`${API_URL}/api/featured?limit=${limit}`);
      expect(response.status()).toBe(422);
    });
  }
});

test.describe('Featured products overlapping the newest', () => {
  let server: TestServer;
  let API_URL: string;

  test.beforeAll(async () => {
    const store = new MemoryDocumentStore();
    store.seed('product', [
      { title: 'Older', tags: [], created_at: day(1) },
      { title: 'Newest and featured', tags: ['featured'], created_at: day(3) },
      { title: 'Middle', tags: [], created_at: day(2) },
    ]);
    server = await startTestServer({ store });
    API_URL = server.baseUrl;
  });

  test.afterAll(async () => {
    await server.close();
  });

  test('should not repeat a featured product in the backfill', async ({ request }) => {
    const response = await request.get(`${API_URL}/api/featured?limit=3`);
    expect(titles(await response.json())).toEqual(['Newest and featured', 'Middle', 'Older']);
  });
});
