import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import type { TranscriptionModel } from '../src/transcription/types';
import { CLOUD_MODEL, gate, LOCAL_MODEL, SECOND_LOCAL_MODEL } from './helpers/fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

async function makeState(
  models: TranscriptionModel[],
  loader: (model: TranscriptionModel) => Promise<void>,
  options = { enhancementEnabled: false, wordReplacementEnabled: false },
) {
  const { CatalogueModelStore } = await import('../src/transcription/modelStore');
  const { ModelState } = await import('../src/transcription/modelState');
  return new ModelState(new CatalogueModelStore(models, loader), options);
}

test('ensureReady reports no_model until a model is selected', async () => {
  const state = await makeState([LOCAL_MODEL], async () => undefined);
  assert.deepEqual(await state.ensureReady(), { ok: false, reason: 'no_model' });
  assert.equal((await state.snapshot()).current, null);
});

test('concurrent ensureReady calls share a single model load', async () => {
  const latch = gate();
  const loads: string[] = [];
  const state = await makeState([LOCAL_MODEL], async (model) => {
    loads.push(model.id);
    await latch.wait();
  });
  await state.selectModel(LOCAL_MODEL.id);

  const pending = Array.from({ length: 5 }, () => state.ensureReady());
  await delay(10);
  assert.deepEqual(loads, ['ggml-base']);
  assert.equal((await state.snapshot()).loaded, false);

  latch.open();
  const results = await Promise.all(pending);
  for (const result of results) {
    assert.deepEqual(result, { ok: true, model: LOCAL_MODEL, loadedNow: true });
  }
  assert.equal((await state.snapshot()).loaded, true);
  assert.deepEqual(await state.ensureReady(), { ok: true, model: LOCAL_MODEL, loadedNow: false });
  assert.equal(loads.length, 1);
});

test('a failed load is reported and retried by the next caller', async () => {
  let attempts = 0;
  const state = await makeState([LOCAL_MODEL], async () => {
    attempts += 1;
    if (attempts === 1) throw new Error('engine offline');
  });
  await state.selectModel(LOCAL_MODEL.id);

  const first = await state.ensureReady();
  assert.equal(first.ok, false);
  if (first.ok || first.reason !== 'load_failed') return;
  assert.equal(first.model.id, 'ggml-base');
  assert.ok(first.cause instanceof Error);
  assert.equal(first.cause.message, 'engine offline');

  assert.deepEqual(await state.ensureReady(), { ok: true, model: LOCAL_MODEL, loadedNow: true });
  assert.equal(attempts, 2);
});

test('models without a load step are ready as soon as they are selected', async () => {
  let loads = 0;
  const state = await makeState([CLOUD_MODEL], async () => {
    loads += 1;
  });
  await state.selectModel(CLOUD_MODEL.id);
  assert.deepEqual(await state.ensureReady(), { ok: true, model: CLOUD_MODEL, loadedNow: false });
  assert.equal(loads, 0);
});

test('selectModel rejects unknown ids and leaves the selection alone', async () => {
  const state = await makeState([LOCAL_MODEL], async () => undefined);
  await state.selectModel(LOCAL_MODEL.id);
  await assert.rejects(state.selectModel('ggml-missing'), {
    name: 'UnknownModelError',
    message: "unknown model 'ggml-missing'",
  });
  assert.equal((await state.snapshot()).current?.id, 'ggml-base');
});

test('switching models requires loading the new one', async () => {
  const loads: string[] = [];
  const state = await makeState([LOCAL_MODEL, SECOND_LOCAL_MODEL], async (model) => {
    loads.push(model.id);
  });
  await state.selectModel(LOCAL_MODEL.id);
  await state.ensureReady();
  await state.selectModel(SECOND_LOCAL_MODEL.id);
  assert.equal((await state.snapshot()).loaded, false);

  assert.deepEqual(await state.ensureReady(), { ok: true, model: SECOND_LOCAL_MODEL, loadedNow: true });
  assert.deepEqual(loads, ['ggml-base', 'ggml-small']);
});

test('snapshot reflects the enhancement switch and the catalogue', async () => {
  const state = await makeState([LOCAL_MODEL, CLOUD_MODEL], async () => undefined, {
    enhancementEnabled: false,
    wordReplacementEnabled: true,
  });
  await state.setEnhancementEnabled(true);
  const snapshot = await state.snapshot();
  assert.equal(snapshot.enhancementEnabled, true);
  assert.equal(snapshot.wordReplacementEnabled, true);
  assert.deepEqual(
    snapshot.available.map((model) => model.id),
    ['ggml-base', 'whisper-1'],
  );
});

test('warmUp selects the preferred model, else the first local one', async () => {
  const preferred = await makeState([CLOUD_MODEL, LOCAL_MODEL, SECOND_LOCAL_MODEL], async () => undefined);
  await preferred.warmUp('ggml-small');
  assert.deepEqual(await preferred.snapshot().then((s) => [s.current?.id, s.loaded]), ['ggml-small', true]);

  const fallback = await makeState([CLOUD_MODEL, LOCAL_MODEL], async () => undefined);
  await fallback.warmUp('ggml-missing');
  assert.equal((await fallback.snapshot()).current?.id, 'ggml-base');

  const empty = await makeState([], async () => undefined);
  await empty.warmUp();
  assert.equal((await empty.snapshot()).current, null);
});

test('warmUp keeps an existing selection and survives a failed load', async () => {
  const state = await makeState([LOCAL_MODEL, SECOND_LOCAL_MODEL], async () => {
    throw new Error('engine offline');
  });
  await state.selectModel(SECOND_LOCAL_MODEL.id);
  await state.warmUp('ggml-base');
  const snapshot = await state.snapshot();
  assert.equal(snapshot.current?.id, 'ggml-small');
  assert.equal(snapshot.loaded, false);
});

test('many concurrent readers and writers all complete', async () => {
  const state = await makeState([LOCAL_MODEL, SECOND_LOCAL_MODEL, CLOUD_MODEL], async () => {
    await delay(2);
  });
  await state.selectModel(LOCAL_MODEL.id);

  const ids = [LOCAL_MODEL.id, SECOND_LOCAL_MODEL.id, CLOUD_MODEL.id];
  const operations: Array<Promise<unknown>> = [];
  for (let i = 0; i < 300; i += 1) {
    switch (i % 4) {
      case 0:
        operations.push(state.ensureReady());
        break;
      case 1:
        operations.push(state.snapshot());
        break;
      case 2:
        operations.push(state.selectModel(ids[i % ids.length]));
        break;
      default:
        operations.push(state.setEnhancementEnabled(i % 8 === 3));
    }
  }

  const deadline = new AbortController();
  const outcome = await Promise.race([
    Promise.all(operations).then(() => 'completed'),
    delay(5_000, 'stalled', { signal: deadline.signal }),
  ]);
  deadline.abort();
  assert.equal(outcome, 'completed');

  const final = await state.ensureReady();
  assert.equal(final.ok, true);
});
