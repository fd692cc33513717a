import { setTimeout as delay } from 'node:timers/promises';

import { afterEach, describe, expect, it } from 'vitest';

import type { LspSession } from '../src/service/lsp-session.js';
import { DocumentTracker, type SyncOutcome } from '../src/tools/document-tracker.js';
import { WORKSPACE_ROOT, createStubSession } from './helpers/stub-peer.js';

const A = `${WORKSPACE_ROOT}/a.ts`;
const B = `${WORKSPACE_ROOT}/b.ts`;

let session: LspSession | undefined;

afterEach(async () => {
  await session?.shutdown();
  session = undefined;
});

async function setup(files: Map<string, string>) {
  const stub = await createStubSession();
  await stub.session.start();
  session = stub.session;
  const tracker = new DocumentTracker(async (filePath) => files.get(filePath) ?? '');
  return { tracker, session: stub.session, server: stub.server };
}

describe('DocumentTracker', () => {
  it('opens a file once and sends changes only when its text differs', async () => {
    const files = new Map([[A, 'v1']]);
    const { tracker, session: live } = await setup(files);
    const outcomes: SyncOutcome[] = [];
    const record = async (_uri: string, outcome: SyncOutcome) => {
      outcomes.push(outcome);
    };

    await tracker.withDocument(live, A, record);
    await tracker.withDocument(live, A, record);
    files.set(A, 'v2');
    await tracker.withDocument(live, A, record);

    expect(outcomes).toEqual(['opened', 'unchanged', 'changed']);
    expect(live.documentVersion(A)).toBe(2);
  });

  it('passes the file URI to the operation', async () => {
    const { tracker, session: live } = await setup(new Map([[A, '']]));

    expect(await tracker.withDocument(live, A, async (uri) => uri)).toBe(
      'file:///workspace/project/a.ts',
    );
  });

  it('runs operations on one document one after another', async () => {
    const { tracker, session: live } = await setup(new Map([[A, '']]));
    const events: string[] = [];
    const step = (name: string, ms: number) => async () => {
      events.push(`start:${name}`);
      await delay(ms);
      events.push(`end:${name}`);
    };

    await Promise.all([
      tracker.withDocument(live, A, step('first', 30)),
      tracker.withDocument(live, A, step('second', 0)),
    ]);

    expect(events).toEqual(['start:first', 'end:first', 'start:second', 'end:second']);
  });

  it('lets different documents proceed independently', async () => {
    const { tracker, session: live } = await setup(new Map([[A, ''], [B, '']]));
    const events: string[] = [];
    const step = (name: string, ms: number) => async () => {
      events.push(`start:${name}`);
      await delay(ms);
      events.push(`end:${name}`);
    };

    await Promise.all([
      tracker.withDocument(live, A, step('a', 40)),
      tracker.withDocument(live, B, step('b', 0)),
    ]);

    expect(events.indexOf('end:b')).toBeLessThan(events.indexOf('end:a'));
  });

  it('keeps the queue moving after a failed operation', async () => {
    const { tracker, session: live } = await setup(new Map([[A, '']]));

    const failed = tracker.withDocument(live, A, async () => {
      throw new Error('request failed');
    });
    const next = tracker.withDocument(live, A, async (_uri, outcome) => outcome);

    await expect(failed).rejects.toThrow('request failed');
    expect(await next).toBe('unchanged');
  });
});
