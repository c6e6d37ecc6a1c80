import { COLLECTION_FILES, createEmptyKnowledgeStore, countRecords, loadKnowledgeStore } from '@/knowledge';
import { createTestTempDir, writeJsonFile } from '../../__support__/utilities/tmp-helpers';
import { WARN_LEVEL, createCapturingLogger } from '../../__support__/utilities/logger';
import { knowledgeFixture } from '../../__support__/fixtures/knowledge';

describe('loadKnowledgeStore', () => {
  let dataDir: string;
  let cleanup: () => void;

  beforeEach(() => {
    const temp = createTestTempDir('knowledge-');
    dataDir = temp.dir.name;
    cleanup = temp.cleanup;
  });

  afterEach(() => {
    cleanup();
  });

  test('should load every collection file', async () => {
    const fixture = knowledgeFixture();
    writeJsonFile(dataDir, COLLECTION_FILES.best_practices, fixture.best_practices);
    writeJsonFile(dataDir, COLLECTION_FILES.snippets, fixture.snippets);
    writeJsonFile(dataDir, COLLECTION_FILES.troubleshooting, fixture.troubleshooting);
    writeJsonFile(dataDir, COLLECTION_FILES.tips, fixture.tips);
    writeJsonFile(dataDir, COLLECTION_FILES.governance, fixture.governance);

    const { logger } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(store.loaded).toBe(true);
    expect(countRecords(store)).toEqual({
      best_practices: 3,
      snippets: 2,
      troubleshooting: 4,
      tips: 3,
      governance: 3,
    });
    expect(store.collections.governance[0]?.zones?.zone2?.requirements).toEqual(['Approval', 'Allow-list']);
  });

  test('should treat a missing file as an empty collection', async () => {
    writeJsonFile(dataDir, COLLECTION_FILES.tips, [{ id: 'tip-1', title: 'Only tip' }]);

    const { logger, lines } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(countRecords(store)).toEqual({
      best_practices: 0,
      snippets: 0,
      troubleshooting: 0,
      tips: 1,
      governance: 0,
    });
    expect(lines.filter((line) => line.msg === 'Data file not found')).toHaveLength(4);
  });

  test('should treat malformed JSON as an empty collection', async () => {
    writeJsonFile(dataDir, COLLECTION_FILES.snippets, '[{"id": "sn-1",');

    const { logger, lines } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(store.collections.snippets).toEqual([]);
    const warning = lines.find((line) => line.msg === 'Failed to read data file');
    expect(warning?.level).toBe(WARN_LEVEL);
  });

  test('should reject a file that is not an array', async () => {
    writeJsonFile(dataDir, COLLECTION_FILES.governance, { feature: 'http-connector' });

    const { logger, lines } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(store.collections.governance).toEqual([]);
    expect(lines.some((line) => line.msg === 'Data file does not contain a JSON array')).toBe(true);
  });

  test('should drop invalid entries and keep the rest', async () => {
    writeJsonFile(dataDir, COLLECTION_FILES.best_practices, [
      { id: 'bp-1', title: 'Valid' },
      { title: 'No id' },
      'not an object',
    ]);

    const { logger, lines } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(store.collections.best_practices.map((item) => item.id)).toEqual(['bp-1']);
    expect(
      lines.filter((line) => line.msg === 'Entry validation failed').map((line) => line.entry),
    ).toEqual(['#1', '#2']);
  });

  test('should keep entries without a title or step action', async () => {
    writeJsonFile(dataDir, COLLECTION_FILES.best_practices, [{ id: 'bp-1', description: 'Handle errors' }]);
    writeJsonFile(dataDir, COLLECTION_FILES.troubleshooting, [
      { id: 'ts-1', title: 'HTTP 403', steps: [{ step: 1, details: 'Check policy' }] },
    ]);

    const { logger, lines } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(store.collections.best_practices).toEqual([{ id: 'bp-1', description: 'Handle errors' }]);
    expect(store.collections.troubleshooting[0]?.steps).toEqual([{ step: 1, details: 'Check policy' }]);
    expect(lines.some((line) => line.msg === 'Entry validation failed')).toBe(false);
  });

  test('should read wrongly typed optional fields as absent', async () => {
    writeJsonFile(dataDir, COLLECTION_FILES.tips, [{ id: 'tip-1', title: 42, tags: 'copilot' }]);

    const { logger } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(store.collections.tips.map((item) => item.id)).toEqual(['tip-1']);
    expect(store.collections.tips[0]?.title).toBeUndefined();
    expect(store.collections.tips[0]?.tags).toBeUndefined();
  });

  test('should read null optional fields as absent and keep unknown fields', async () => {
    writeJsonFile(dataDir, COLLECTION_FILES.tips, [
      { id: 'tip-1', title: 'Nulls', category: null, tags: null, owner: 'platform-team' },
    ]);

    const { logger } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(store.collections.tips[0]).toEqual({ id: 'tip-1', title: 'Nulls', owner: 'platform-team' });
  });

  test('should freeze the loaded snapshot', async () => {
    writeJsonFile(dataDir, COLLECTION_FILES.tips, [{ id: 'tip-1', title: 'Frozen' }]);

    const { logger } = createCapturingLogger();
    const store = await loadKnowledgeStore(dataDir, { logger });

    expect(Object.isFrozen(store.collections.tips)).toBe(true);
    expect(Object.isFrozen(store.collections.tips[0])).toBe(true);
  });
});

describe('createEmptyKnowledgeStore', () => {
  test('should report not loaded', () => {
    const store = createEmptyKnowledgeStore();
    expect(store.loaded).toBe(false);
    expect(store.collections.best_practices).toEqual([]);
  });
});
