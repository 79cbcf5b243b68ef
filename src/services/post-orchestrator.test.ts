import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PostOrchestrator } from './post-orchestrator.js';
import { ContentPipeline } from './content-pipeline.js';
import { PostRecordStore } from './post-records.js';
import type { Publisher } from './linkedin-api.js';
import type { PostResult } from '../types/post.js';
import type { ProfileDescriptor } from '../types/content.js';
import { InvalidArgumentError, PublishError } from '../utils/errors.js';
import { seededRandom } from '../utils/random.js';
import { StubLLM, words } from '../test-utils/fakes.js';

const profile: ProfileDescriptor = {
  name: 'Sam Carter',
  pronouns: '(They/Them)',
  title: 'Data Engineer',
  skills: ['SQL', 'Airflow'],
  profileUrl: 'https://www.linkedin.com/in/sam-carter-example/',
  primaryKeywords: ['zzz'],
};

const SHORT = words(20);
const VALID = words(160);

const published: PostResult = {
  success: true,
  status: 'success',
  postId: 'urn:li:share:99',
  details: { timestamp: '2026-01-05T10:00:01.000Z' },
};

describe('PostOrchestrator.createSeoPost', () => {
  let dir: string;
  let recordsPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'seopost-orchestrator-'));
    recordsPath = join(dir, 'records.json');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function build(llm: StubLLM, publish: Publisher['publish'] = async () => published, path: string = recordsPath) {
    const publisher = { publish: vi.fn(publish) };
    const store = new PostRecordStore(path, profile.primaryKeywords);
    const orchestrator = new PostOrchestrator({
      pipeline: new ContentPipeline({ llm, profile, random: seededRandom(1) }),
      publisher,
      store,
      now: () => new Date('2026-01-05T10:00:00.000Z'),
    });
    return { orchestrator, publisher, store };
  }

  it('records one error after every attempt fails length validation', async () => {
    const llm = new StubLLM([SHORT]);
    const { orchestrator, publisher, store } = build(llm);

    const result = await orchestrator.createSeoPost(3);

    expect(result).toEqual({
      success: false,
      errorKind: 'LengthValidationFailure',
      error: 'Content length stayed outside the allowed range after 3 attempt(s)',
    });
    expect(llm.prompts).toHaveLength(3);
    expect(publisher.publish).not.toHaveBeenCalled();

    const records = store.readAll();
    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record.kind).toBe('error');
    if (record.kind === 'error') {
      expect(record.error.attempts).toBe(3);
      expect(record.error.errorKind).toBe('LengthValidationFailure');
      expect(record.error.content).toBe(SHORT);
      expect(record.seoMetrics?.contentLength).toBe(20);
    }
  });

  it('regenerates after an invalid draft and publishes the valid one', async () => {
    const llm = new StubLLM([SHORT, VALID]);
    const { orchestrator, publisher, store } = build(llm);

    const result = await orchestrator.createSeoPost(3);

    expect(result).toEqual(published);
    expect(llm.prompts).toHaveLength(2);
    expect(publisher.publish).toHaveBeenCalledTimes(1);
    expect(publisher.publish).toHaveBeenCalledWith(VALID);

    const records = store.readAll();
    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record.kind).toBe('post');
    if (record.kind === 'post') {
      expect(record.attempt).toBe(2);
      expect(record.success).toBe(true);
      expect(record.postId).toBe('urn:li:share:99');
      expect(record.error).toBeNull();
      expect(record.date).toBe('2026-01-05T10:00:00.000Z');
      expect(record.optimizationMetrics).toEqual({ wordCount: 160, primaryKeywordsUsed: { zzz: 0 } });
    }
  });

  it('records a failed publish and does not retry it', async () => {
    const llm = new StubLLM([VALID]);
    const failed: PostResult = { success: false, errorKind: 'PublishError', error: 'HTTP 422' };
    const { orchestrator, publisher, store } = build(llm, async () => failed);

    const result = await orchestrator.createSeoPost(3);

    expect(result).toEqual(failed);
    expect(llm.prompts).toHaveLength(1);
    expect(publisher.publish).toHaveBeenCalledTimes(1);

    const [record] = store.readAll();
    expect(record).toMatchObject({
      kind: 'post',
      success: false,
      postId: null,
      error: 'HTTP 422',
      errorKind: 'PublishError',
      attempt: 1,
    });
  });

  it('retries after a generation error', async () => {
    const llm = new StubLLM([new Error('model offline'), VALID]);
    const { orchestrator, store } = build(llm);

    const result = await orchestrator.createSeoPost(3);

    expect(result.success).toBe(true);
    expect(store.readAll()).toMatchObject([{ kind: 'post', attempt: 2 }]);
  });

  it('records the last error when every attempt throws', async () => {
    const llm = new StubLLM([new Error('model offline')]);
    const { orchestrator, store } = build(llm);

    const result = await orchestrator.createSeoPost(2);

    expect(result).toEqual({ success: false, errorKind: 'Unclassified', error: 'model offline' });
    const [record] = store.readAll();
    expect(record).toEqual({
      kind: 'error',
      date: '2026-01-05T10:00:00.000Z',
      error: { success: false, error: 'model offline', errorKind: 'Unclassified', attempts: 2 },
    });
  });

  it('keeps the formatted content when the publisher throws on the last attempt', async () => {
    const llm = new StubLLM([VALID]);
    const { orchestrator, store } = build(llm, async () => {
      throw new PublishError('connection reset');
    });

    const result = await orchestrator.createSeoPost(1);

    expect(result).toEqual({ success: false, errorKind: 'PublishError', error: 'connection reset' });
    const [record] = store.readAll();
    expect(record.kind === 'error' && record.error.content).toBe(VALID);
  });

  it('rejects a non-positive attempt count', async () => {
    const { orchestrator } = build(new StubLLM([VALID]));
    await expect(orchestrator.createSeoPost(0)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(orchestrator.createSeoPost(1.5)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('refuses to start while another run is in progress', async () => {
    let release: (result: PostResult) => void = () => {};
    const gate = new Promise<PostResult>((resolve) => {
      release = resolve;
    });
    const llm = new StubLLM([VALID]);
    const { orchestrator, publisher, store } = build(llm, () => gate);

    const first = orchestrator.createSeoPost(1);
    await vi.waitFor(() => expect(publisher.publish).toHaveBeenCalledTimes(1));
    expect(orchestrator.isRunning()).toBe(true);

    const second = await orchestrator.createSeoPost(1);
    expect(second).toMatchObject({ success: false, errorKind: 'ConcurrentRun' });

    release(published);
    await expect(first).resolves.toEqual(published);
    expect(orchestrator.isRunning()).toBe(false);
    expect(llm.prompts).toHaveLength(1);
    expect(store.readAll()).toHaveLength(1);
  });

  it('still returns the publish result when the record cannot be saved', async () => {
    // A directory where the file should be makes every read fail
    const { orchestrator } = build(new StubLLM([VALID]), async () => published, dir);

    await expect(orchestrator.createSeoPost(1)).resolves.toEqual(published);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Error saving post record'));
  });
});
