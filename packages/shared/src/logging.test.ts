import {expect, test} from 'vitest';
import {createLogContext} from './logging.ts';
import {createSilentLogContext, TestLogSink} from './logging-test-utils.ts';

test('single sink', () => {
  const sink = new TestLogSink();
  const lc = createLogContext('info', [sink]);
  lc.info?.('hello');
  lc.debug?.('hidden');
  expect(sink.messages).toEqual([['info', undefined, ['hello']]]);
});

test('several sinks all receive the message', () => {
  const sinkA = new TestLogSink();
  const sinkB = new TestLogSink();
  const lc = createLogContext('debug', [sinkA, sinkB], {run: 1});
  lc.debug?.('hello');
  expect(sinkA.messages).toEqual([['debug', {run: 1}, ['hello']]]);
  expect(sinkB.messages).toEqual(sinkA.messages);
});

test('silent context drops everything below error', () => {
  const lc = createSilentLogContext();
  expect(lc.info).toBeUndefined();
  expect(lc.debug).toBeUndefined();
});
