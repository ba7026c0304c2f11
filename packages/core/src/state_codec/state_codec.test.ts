import { encodeStateDocument, decodeStateDocument, validateStateDocument } from './state_codec';
import { isStateBoxError } from '../state_box/state_box.errors';
import type { StateDocument } from '../state_box/state_box.types';

function createDocument(): StateDocument {
  return {
    schemaVersion: '1.0',
    release: '4.19.1',
    createdAt: '2025-01-15T10:00:00Z',
    updatedAt: '2025-01-15T10:30:00Z',
    metadata: {
      jiraTicket: 'ART-1234',
      advisoryIds: { rpm: 1001, extras: 1002 },
      releaseDate: '2025-Jan-20',
      candidateBuilds: {},
      shipmentMr: null,
    },
    tasks: [
      {
        name: 'image-consistency-check',
        status: 'Pass',
        startedAt: '2025-01-15T10:05:00Z',
        completedAt: '2025-01-15T10:20:00Z',
        result: '2025-01-15T10:05:00Z started\n2025-01-15T10:20:00Z all images consistent',
      },
    ],
    issues: [
      {
        description: 'CVE tracker bug missing',
        reportedAt: '2025-01-15T10:25:00Z',
        resolved: false,
        resolution: null,
        resolvedAt: null,
        blocker: true,
        relatedTasks: ['check-cve-tracker-bug'],
      },
    ],
  };
}

describe('StateCodec', () => {
  describe('encodeStateDocument', () => {
    it('should round trip a document unchanged', () => {
      const document = createDocument();

      const decoded = decodeStateDocument(encodeStateDocument(document));

      expect(decoded).toEqual(document);
    });

    it('should write multi-line results as literal blocks', () => {
      const text = encodeStateDocument(createDocument());

      expect(text).toContain('    result: |-\n      2025-01-15T10:05:00Z started\n      2025-01-15T10:20:00Z all images consistent\n');
    });

    it('should quote timestamps and the schema version', () => {
      const text = encodeStateDocument(createDocument());

      expect(text).toContain("createdAt: '2025-01-15T10:00:00Z'\n");
      expect(text).toContain("schemaVersion: '1.0'\n");
    });

    it('should produce identical text for identical documents', () => {
      expect(encodeStateDocument(createDocument())).toBe(encodeStateDocument(createDocument()));
    });

    it('should refuse to write a timestamp that names no real date', () => {
      const document = createDocument();
      const invalid: StateDocument = {
        ...document,
        tasks: document.tasks.map((task) => ({ ...task, startedAt: '2025-13-45T10:00:00Z' })),
      };

      let caught: unknown;
      try {
        encodeStateDocument(invalid);
      } catch (error) {
        caught = error;
      }

      expect(isStateBoxError(caught, 'VALIDATION')).toBe(true);
      expect(caught).toHaveProperty('detail.field', '/tasks/0/startedAt');
    });
  });

  describe('decodeStateDocument', () => {
    it('should keep unquoted timestamps as strings', () => {
      const text = [
        'schemaVersion: "1.0"',
        'release: 4.19.1',
        'createdAt: 2025-01-15T10:00:00Z',
        'updatedAt: 2025-01-15T10:00:00Z',
        'metadata: {}',
        'tasks: []',
        'issues: []',
        '',
      ].join('\n');

      const decoded = decodeStateDocument(text);

      expect(decoded.createdAt).toBe('2025-01-15T10:00:00Z');
      expect(decoded.release).toBe('4.19.1');
    });

    it('should raise a BACKEND error for malformed YAML', () => {
      expect.assertions(2);
      try {
        decodeStateDocument('tasks: [unclosed', 'broken.yaml');
      } catch (error) {
        expect(isStateBoxError(error, 'BACKEND')).toBe(true);
        expect((error as Error).message).toBe('Malformed YAML in broken.yaml');
      }
    });

    it('should raise a BACKEND error for content that is not a state document', () => {
      expect(() => decodeStateDocument('release: 4.19.1\n')).toThrow(/Invalid state document in document/);
    });
  });

  describe('validateStateDocument', () => {
    it('should reject unknown task names', () => {
      const document = createDocument();
      const data: unknown = { ...document, tasks: [{ ...document.tasks[0], name: 'deploy-to-mars' }] };

      const [isValid, errors] = validateStateDocument(data);

      expect(isValid).toBe(false);
      expect(errors.map((e) => e.field)).toContain('/tasks/0/name');
    });

    it('should reject nested metadata deeper than one level', () => {
      const data: unknown = { ...createDocument(), metadata: { advisoryIds: { rpm: { id: 1 } } } };

      const [isValid] = validateStateDocument(data);

      expect(isValid).toBe(false);
    });

    it('should accept a valid document', () => {
      expect(validateStateDocument(createDocument())).toEqual([true, []]);
    });
  });
});
