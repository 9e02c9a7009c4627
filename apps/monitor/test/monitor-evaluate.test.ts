import { describe, expect, it } from 'vitest';

import { evaluateProbeOutcome, formatSeconds } from '../src/monitor/evaluate';

describe('monitor/evaluate', () => {
  it('passes the expected code within the slow threshold', () => {
    expect(evaluateProbeOutcome({ httpCode: '200', elapsedSeconds: 0.4, errorDetail: '' }, 2, '200')).toBeNull();
  });

  it('treats a response exactly at the threshold as fast enough', () => {
    expect(evaluateProbeOutcome({ httpCode: '200', elapsedSeconds: 2, errorDetail: '' }, 2, '200')).toBeNull();
  });

  it('reports an unexpected status code', () => {
    expect(evaluateProbeOutcome({ httpCode: '503', elapsedSeconds: 0.1, errorDetail: '' }, 2, '200')).toBe(
      'HTTP 503',
    );
  });

  it('prefers the status code over slowness', () => {
    expect(evaluateProbeOutcome({ httpCode: '502', elapsedSeconds: 9, errorDetail: '' }, 2, '200')).toBe(
      'HTTP 502',
    );
  });

  it('reports the transport error kind for code 000', () => {
    expect(
      evaluateProbeOutcome({ httpCode: '000', elapsedSeconds: 5, errorDetail: 'timeout' }, 2, '200'),
    ).toBe('timeout');
    expect(evaluateProbeOutcome({ httpCode: '000', elapsedSeconds: 0, errorDetail: '' }, 2, '200')).toBe(
      'connect_fail',
    );
  });

  it('reports slow responses with three decimals', () => {
    expect(
      evaluateProbeOutcome({ httpCode: '200', elapsedSeconds: 3.2, errorDetail: '' }, 2, '200'),
    ).toBe('slow response 3.200s');
  });

  it('honors a non-default expected code', () => {
    expect(evaluateProbeOutcome({ httpCode: '204', elapsedSeconds: 0.1, errorDetail: '' }, 2, '204')).toBeNull();
    expect(evaluateProbeOutcome({ httpCode: '200', elapsedSeconds: 0.1, errorDetail: '' }, 2, '204')).toBe(
      'HTTP 200',
    );
  });

  it('formats seconds', () => {
    expect(formatSeconds(0.1234)).toBe('0.123s');
    expect(formatSeconds(12)).toBe('12.000s');
  });
});
