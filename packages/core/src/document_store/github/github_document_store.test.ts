/**
 * GitHubDocumentStore Unit Tests
 *
 * Tests the Contents API backend against a mocked Octokit.
 *
 * Blocks:
 * - A: read (decode, 404, invalid responses)
 * - B: create / write (SHA precondition, returned version)
 * - C: Error mapping
 */

import { GitHubDocumentStore } from './github_document_store';
import type { Octokit } from '@octokit/rest';
import { DocumentStoreError } from '../document_store.errors';

// ==================== Test Helpers ====================

type MockOctokit = Octokit & {
  rest: {
    repos: {
      getContent: jest.MockedFunction<any>;
      createOrUpdateFileContents: jest.MockedFunction<any>;
    };
  };
};

function createMockOctokit(): MockOctokit {
  return {
    rest: {
      repos: {
        getContent: jest.fn(),
        createOrUpdateFileContents: jest.fn(),
      },
    },
  } as unknown as MockOctokit;
}

function createOctokitError(status: number, message = 'Error'): Error & { status: number } {
  const error = new Error(message) as Error & { status: number };
  error.status = status;
  return error;
}

function fileResponse(content: string, sha: string) {
  return {
    data: {
      type: 'file',
      encoding: 'base64',
      size: content.length,
      name: '4.19.1.yaml',
      path: DOC_PATH,
      sha,
      content: Buffer.from(content, 'utf-8').toString('base64'),
    },
  };
}

async function captureStoreError(promise: Promise<unknown>): Promise<DocumentStoreError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof DocumentStoreError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected promise to reject');
}

const DOC_PATH = '_releases/4.19/statebox/4.19.1.yaml';

// ==================== Tests ====================

describe('GitHubDocumentStore', () => {
  let octokit: MockOctokit;
  let store: GitHubDocumentStore;

  beforeEach(() => {
    octokit = createMockOctokit();
    store = new GitHubDocumentStore({ owner: 'test-org', repo: 'test-repo', ref: 'z-stream' }, octokit);
  });

  // ==================== A: read ====================

  describe('A: read', () => {
    it('WHEN the file exists, THE SYSTEM SHALL decode it and use the blob SHA as version', async () => {
      octokit.rest.repos.getContent.mockResolvedValue(fileResponse('release: 4.19.1\n', 'sha-1'));

      const snapshot = await store.read(DOC_PATH);

      expect(snapshot).toEqual({ content: 'release: 4.19.1\n', version: 'sha-1' });
      expect(octokit.rest.repos.getContent).toHaveBeenCalledWith({
        owner: 'test-org',
        repo: 'test-repo',
        path: DOC_PATH,
        ref: 'z-stream',
      });
    });

    it('WHEN the file is missing, THE SYSTEM SHALL return null', async () => {
      octokit.rest.repos.getContent.mockRejectedValue(createOctokitError(404, 'Not Found'));

      expect(await store.read(DOC_PATH)).toBeNull();
      expect(await store.exists(DOC_PATH)).toBe(false);
    });

    it('WHEN the path is a directory, THE SYSTEM SHALL raise INVALID_RESPONSE', async () => {
      octokit.rest.repos.getContent.mockResolvedValue({ data: [] });

      const error = await captureStoreError(store.read(DOC_PATH));

      expect(error.code).toBe('INVALID_RESPONSE');
    });

    it('WHEN the content is not inlined, THE SYSTEM SHALL raise INVALID_RESPONSE', async () => {
      octokit.rest.repos.getContent.mockResolvedValue({
        data: { ...fileResponse('', 'sha-1').data, encoding: 'none', content: '' },
      });

      const error = await captureStoreError(store.read(DOC_PATH));

      expect(error.code).toBe('INVALID_RESPONSE');
      expect(error.message).toContain('encoding "none"');
    });
  });

  // ==================== B: create / write ====================

  describe('B: create / write', () => {
    it('WHEN creating, THE SYSTEM SHALL PUT without a SHA and return the new blob SHA', async () => {
      octokit.rest.repos.createOrUpdateFileContents.mockResolvedValue({ data: { content: { sha: 'sha-new' } } });

      const version = await store.create(DOC_PATH, 'a: 1\n', { message: 'Add issue: Stage push failed' });

      expect(version).toBe('sha-new');
      expect(octokit.rest.repos.createOrUpdateFileContents).toHaveBeenCalledWith({
        owner: 'test-org',
        repo: 'test-repo',
        path: DOC_PATH,
        message: 'Add issue: Stage push failed',
        content: Buffer.from('a: 1\n', 'utf-8').toString('base64'),
        branch: 'z-stream',
      });
    });

    it('WHEN writing, THE SYSTEM SHALL pass the expected SHA and the default message', async () => {
      octokit.rest.repos.createOrUpdateFileContents.mockResolvedValue({ data: { content: { sha: 'sha-2' } } });

      const version = await store.write(DOC_PATH, 'a: 2\n', 'sha-1');

      expect(version).toBe('sha-2');
      expect(octokit.rest.repos.createOrUpdateFileContents).toHaveBeenCalledWith(
        expect.objectContaining({ sha: 'sha-1', message: 'Update state' }),
      );
    });

    it('WHEN the response carries no SHA, THE SYSTEM SHALL raise INVALID_RESPONSE', async () => {
      octokit.rest.repos.createOrUpdateFileContents.mockResolvedValue({ data: { content: null } });

      const error = await captureStoreError(store.write(DOC_PATH, 'a: 2\n', 'sha-1'));

      expect(error.code).toBe('INVALID_RESPONSE');
    });
  });

  // ==================== C: Error mapping ====================

  describe('C: Error mapping', () => {
    it.each([
      [401, 'PERMISSION_DENIED'],
      [403, 'PERMISSION_DENIED'],
      [404, 'NOT_FOUND'],
      [409, 'VERSION_CONFLICT'],
      [422, 'VERSION_CONFLICT'],
      [502, 'SERVER_ERROR'],
      [418, 'SERVER_ERROR'],
    ])('WHEN write fails with %i, THE SYSTEM SHALL raise %s', async (status, code) => {
      octokit.rest.repos.createOrUpdateFileContents.mockRejectedValue(createOctokitError(status));

      const error = await captureStoreError(store.write(DOC_PATH, 'a: 2\n', 'sha-1'));

      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(status);
    });

    it('WHEN create fails with 422, THE SYSTEM SHALL raise ALREADY_EXISTS', async () => {
      octokit.rest.repos.createOrUpdateFileContents.mockRejectedValue(createOctokitError(422));

      const error = await captureStoreError(store.create(DOC_PATH, 'a: 1\n'));

      expect(error.code).toBe('ALREADY_EXISTS');
    });

    it('WHEN the request never reaches GitHub, THE SYSTEM SHALL raise NETWORK_ERROR', async () => {
      octokit.rest.repos.getContent.mockRejectedValue(new Error('getaddrinfo ENOTFOUND api.github.com'));

      const error = await captureStoreError(store.read(DOC_PATH));

      expect(error.code).toBe('NETWORK_ERROR');
      expect(error.message).toBe(`Network error: GET ${DOC_PATH}: getaddrinfo ENOTFOUND api.github.com`);
    });

    it('WHEN read fails with 500, THE SYSTEM SHALL raise SERVER_ERROR', async () => {
      octokit.rest.repos.getContent.mockRejectedValue(createOctokitError(500));

      const error = await captureStoreError(store.read(DOC_PATH));

      expect(error.code).toBe('SERVER_ERROR');
    });
  });
});
