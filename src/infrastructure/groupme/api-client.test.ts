import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { createApiClient } from './api-client';
import { groupMessagesResponseSchema } from './schemas';

const BASE_URL = 'https://api.example.test/v3';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

const countSchema = z.object({ count: z.number() });

function setup(respond: () => Response | Promise<Response>) {
  const fetchImpl = vi.fn<typeof fetch>(async () => respond());
  const client = createApiClient({
    baseUrl: `${BASE_URL}/`,
    apiToken: 'test-token',
    fetchImpl,
  });
  return { client, fetchImpl };
}

describe('createApiClient', () => {
  describe('get', () => {
    it('appends the token after the other query parameters and skips null values', async () => {
      const { client, fetchImpl } = setup(() => jsonResponse({ count: 3 }));

      const body = await client.get(
        '/groups/g1/messages',
        [
          ['limit', 100],
          ['before_id', null],
        ],
        countSchema
      );

      expect(body).toEqual({ count: 3 });
      expect(fetchImpl).toHaveBeenCalledWith(
        `${BASE_URL}/groups/g1/messages?limit=100&token=test-token`,
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      );
    });

    it('keeps the order of the given parameters', async () => {
      const { client, fetchImpl } = setup(() => jsonResponse({ count: 0 }));

      await client.get(
        '/groups/g1/messages',
        [
          ['limit', 100],
          ['before_id', '42'],
        ],
        countSchema
      );

      expect(fetchImpl.mock.calls[0]?.[0]).toBe(
        `${BASE_URL}/groups/g1/messages?limit=100&before_id=42&token=test-token`
      );
    });

    it('returns null for 304 Not Modified', async () => {
      const { client } = setup(() => new Response(null, { status: 304 }));

      await expect(client.get('/groups', [], countSchema)).resolves.toBeNull();
    });

    it('reports a non-success status as a transport error without leaking the token', async () => {
      const { client } = setup(() => jsonResponse({ meta: { code: 500 } }, 500));

      const error = await client.get('/groups', [['page', 2]], countSchema).catch((e: unknown) => e);

      expect(error).toMatchObject({
        code: 'TRANSPORT_ERROR',
        details: { url: 'GET /groups?page=2', status: 500 },
      });
      expect(String(error)).not.toContain('test-token');
    });

    it('wraps a network failure as a transport error', async () => {
      const { client } = setup(() => {
        throw new TypeError('fetch failed');
      });

      await expect(client.get('/groups', [], countSchema)).rejects.toMatchObject({
        code: 'TRANSPORT_ERROR',
        details: { url: 'GET /groups' },
      });
    });

    it('reports a body that is not JSON as a decode error at the root', async () => {
      const { client } = setup(() => new Response('<html>oops</html>', { status: 200 }));

      await expect(client.get('/groups', [], countSchema)).rejects.toMatchObject({
        code: 'DECODE_ERROR',
        details: { path: '(root)' },
      });
    });

    it('reports the path of the first field that does not match the schema', async () => {
      const { client } = setup(() =>
        jsonResponse({
          meta: { code: 200 },
          response: {
            count: 1,
            messages: [
              {
                id: '1',
                source_guid: 'guid-1',
                created_at: 'yesterday',
                user_id: 'u1',
                group_id: 'g1',
                name: 'Alice',
                system: false,
                favorited_by: [],
                attachments: [],
              },
            ],
          },
        })
      );

      await expect(
        client.get('/groups/g1/messages', [], groupMessagesResponseSchema)
      ).rejects.toMatchObject({
        code: 'DECODE_ERROR',
        details: { path: 'response.messages[0].created_at' },
      });
    });

    it('reports a known attachment with missing fields at the attachment itself', async () => {
      const { client } = setup(() =>
        jsonResponse({
          meta: { code: 200 },
          response: {
            count: 1,
            messages: [
              {
                id: '1',
                source_guid: 'guid-1',
                created_at: 1717200000,
                user_id: 'u1',
                group_id: 'g1',
                name: 'Alice',
                system: false,
                favorited_by: [],
                attachments: [{ type: 'image' }],
              },
            ],
          },
        })
      );

      await expect(
        client.get('/groups/g1/messages', [], groupMessagesResponseSchema)
      ).rejects.toMatchObject({
        code: 'DECODE_ERROR',
        details: { path: 'response.messages[0].attachments[0]' },
      });
    });
  });

  describe('download', () => {
    it('returns the response bytes without adding the token', async () => {
      const { client, fetchImpl } = setup(() => new Response(new Uint8Array([1, 2, 3])));

      const bytes = await client.download('https://i.example.test/photo.jpeg.abc');

      expect(Array.from(bytes)).toEqual([1, 2, 3]);
      expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://i.example.test/photo.jpeg.abc');
    });

    it('reports a failed download as a transport error', async () => {
      const { client } = setup(() => new Response('missing', { status: 404 }));

      await expect(client.download('https://i.example.test/gone.png.x')).rejects.toMatchObject({
        code: 'TRANSPORT_ERROR',
        details: { status: 404 },
      });
    });
  });
});
