/**
 * Tests for the axios-backed content store. axios.create() hands back a
 * fake client so no request leaves the process.
 */

import axios from 'axios';
import { HttpContentStore } from '../src/lib/http-content-store';
import { AuthenticationError } from '../src/lib/errors';

const mockClient = {
  get: jest.fn(),
  post: jest.fn(),
  put: jest.fn(),
  delete: jest.fn(),
  interceptors: {
    request: { use: jest.fn() },
    response: { use: jest.fn() },
  },
};

jest.mock('axios', () => {
  const actual = jest.requireActual<typeof import('axios')>('axios');
  return {
    __esModule: true,
    default: {
      create: jest.fn(() => mockClient),
      isAxiosError: actual.isAxiosError,
    },
  };
});

const actualAxios = jest.requireActual<typeof import('axios')>('axios');

function httpError(status: number, data: unknown = {}) {
  const config = { headers: new actualAxios.AxiosHeaders() };
  return new actualAxios.AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_RESPONSE',
    config,
    undefined,
    { data, status, statusText: '', headers: {}, config },
  );
}

describe('HttpContentStore', () => {
  let store: HttpContentStore;

  beforeEach(() => {
    jest.clearAllMocks();
    store = new HttpContentStore({ url: 'https://cms.test/', apiKey: 'test-api-key' });
  });

  it('creates a client for the API base URL with bearer auth', () => {
    expect(jest.mocked(axios.create)).toHaveBeenCalledWith({
      baseURL: 'https://cms.test',
      headers: {
        'Authorization': 'Bearer test-api-key',
        'Content-Type': 'application/json',
      },
    });
  });

  describe('queryRecords', () => {
    it('posts the query and returns IDs and total', async () => {
      mockClient.post.mockResolvedValue({ data: { ids: [3, 2], total: 7 } });
      const query = {
        type: 'post',
        perPage: 2,
        metaQuery: { relation: 'AND' as const, clauses: [{ key: '_thumbnail_id', compare: 'NOT EXISTS' as const }] },
      };

      const result = await store.queryRecords(query);

      expect(mockClient.post).toHaveBeenCalledWith('/api/records/query', query);
      expect(result).toEqual({ ids: [3, 2], total: 7 });
    });

    it('falls back to the number of IDs when total is missing', async () => {
      mockClient.post.mockResolvedValue({ data: { ids: [1] } });

      expect(await store.queryRecords({ perPage: 'all' })).toEqual({ ids: [1], total: 1 });
    });

    it('rejects a response without an ids array', async () => {
      mockClient.post.mockResolvedValue({ data: { items: [] } });

      await expect(store.queryRecords({ perPage: 'all' })).rejects.toThrow('missing "ids" array');
    });
  });

  describe('metadata', () => {
    it('reads a value', async () => {
      mockClient.get.mockResolvedValue({ data: { value: 'true' } });

      expect(await store.getMeta(5, 'set-post-thumbs--no-thumbnail')).toBe('true');
      expect(mockClient.get).toHaveBeenCalledWith('/api/records/5/meta/set-post-thumbs--no-thumbnail');
    });

    it('returns null for a missing key', async () => {
      mockClient.get.mockRejectedValue(httpError(404));

      expect(await store.getMeta(5, 'absent')).toBeNull();
    });

    it('writes a value', async () => {
      mockClient.put.mockResolvedValue({ data: {} });

      await store.setMeta(5, 'set-post-thumbs--multiple-images', '12,11');

      expect(mockClient.put).toHaveBeenCalledWith(
        '/api/records/5/meta/set-post-thumbs--multiple-images',
        { value: '12,11' },
      );
    });

    it('reports whether a delete removed anything', async () => {
      mockClient.delete.mockResolvedValueOnce({ data: {} });
      mockClient.delete.mockRejectedValueOnce(httpError(404));

      expect(await store.deleteMeta(5, 'key')).toBe(true);
      expect(await store.deleteMeta(5, 'key')).toBe(false);
      expect(mockClient.delete).toHaveBeenCalledWith('/api/records/5/meta/key');
    });

    it('encodes keys in the path', async () => {
      mockClient.get.mockResolvedValue({ data: { value: 'x' } });

      await store.getMeta(5, 'a/b c');

      expect(mockClient.get).toHaveBeenCalledWith('/api/records/5/meta/a%2Fb%20c');
    });
  });

  describe('setFeaturedImage', () => {
    it('returns the assigned media ID', async () => {
      mockClient.put.mockResolvedValue({ data: { mediaId: 100 } });

      expect(await store.setFeaturedImage(43, 100)).toBe(100);
      expect(mockClient.put).toHaveBeenCalledWith('/api/records/43/featured-image', { mediaId: 100 });
    });

    it('returns 0 when the host does not confirm an ID', async () => {
      mockClient.put.mockResolvedValue({ data: { mediaId: false } });

      expect(await store.setFeaturedImage(43, 100)).toBe(0);
    });
  });

  describe('getAttachedMedia', () => {
    it('requests attachments with the MIME filter and limit', async () => {
      const media = [{ id: 100, parentId: 43, mimeType: 'image/jpeg' }];
      mockClient.get.mockResolvedValue({ data: media });

      const result = await store.getAttachedMedia({ parentId: 43, mimeType: 'image', limit: 1 });

      expect(result).toEqual(media);
      expect(mockClient.get).toHaveBeenCalledWith('/api/records/43/attachments', {
        params: { mimeType: 'image', limit: 1 },
      });
    });

    it('rejects entries without a numeric id', async () => {
      mockClient.get.mockResolvedValue({ data: [{ mediaId: 5, parentId: 43, mimeType: 'image/jpeg' }] });

      await expect(store.getAttachedMedia({ parentId: 43, mimeType: 'image', limit: 1 }))
        .rejects.toThrow('unexpected attachments response');
    });

    it('rejects string ids and non-array payloads', async () => {
      mockClient.get.mockResolvedValueOnce({ data: [{ id: '12', parentId: 43, mimeType: 'image/jpeg' }] });
      mockClient.get.mockResolvedValueOnce({ data: { items: [] } });

      await expect(store.getAttachedMedia({ parentId: 43, mimeType: 'image', limit: 1 }))
        .rejects.toThrow('unexpected attachments response');
      await expect(store.getAttachedMedia({ parentId: 43, mimeType: 'image', limit: 1 }))
        .rejects.toThrow('unexpected attachments response');
    });
  });

  describe('errors', () => {
    it('turns 401 responses into an AuthenticationError', async () => {
      mockClient.post.mockRejectedValue(httpError(401));

      const error = await store.queryRecords({ perPage: 'all' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toHaveProperty('status', 401);
    });

    it('propagates other failures unchanged', async () => {
      const failure = httpError(500, { message: 'boom' });
      mockClient.put.mockRejectedValue(failure);

      await expect(store.setMeta(1, 'key', 'value')).rejects.toBe(failure);
    });

    it('propagates network errors unchanged', async () => {
      const failure = new Error('socket hang up');
      mockClient.get.mockRejectedValue(failure);

      await expect(store.getAttachedMedia({ parentId: 1, mimeType: 'image', limit: 1 })).rejects.toBe(failure);
    });
  });
});
