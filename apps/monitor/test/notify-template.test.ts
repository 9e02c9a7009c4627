import { describe, expect, it } from 'vitest';

import { buildOriginAlertMessage } from '../src/notify/template';
import { shellQuote, splitArgs } from '../src/process';

describe('notify/template', () => {
  it('puts every field on one line', () => {
    expect(
      buildOriginAlertMessage({
        target: { name: 'edge1', domain: 'example.com', originIp: '10.0.0.5' },
        reason: 'HTTP 502',
        elapsedSeconds: 0.0456,
        consecutiveFailures: 3,
        timestamp: '2026-01-02 03:04:05',
      }),
    ).toBe(
      '[reachwatch] origin check failing | name: edge1 | domain: example.com | IP: 10.0.0.5 | ' +
        'reason: HTTP 502 | elapsed: 0.046s | consecutive failures: 3 | time: 2026-01-02 03:04:05',
    );
  });
});

describe('process argument helpers', () => {
  it('splits option strings on whitespace', () => {
    expect(splitArgs('  -o BatchMode=yes\t-o  ConnectTimeout=5 ')).toEqual([
      '-o',
      'BatchMode=yes',
      '-o',
      'ConnectTimeout=5',
    ]);
    expect(splitArgs('')).toEqual([]);
  });

  it('keeps quoted option values together', () => {
    expect(splitArgs(`-o "ProxyCommand=ssh -W %h:%p bastion" -o 'User=ops team'`)).toEqual([
      '-o',
      'ProxyCommand=ssh -W %h:%p bastion',
      '-o',
      'User=ops team',
    ]);
    expect(splitArgs(`-i "" -o Opt=a\\ b "say \\"hi\\"" 'c:\\tmp'`)).toEqual([
      '-i',
      '',
      '-o',
      'Opt=a b',
      'say "hi"',
      'c:\\tmp',
    ]);
  });

  it('quotes only when the remote shell would split or expand', () => {
    expect(shellQuote('/opt/send.sh')).toBe('/opt/send.sh');
    expect(shellQuote('')).toBe("''");
    expect(shellQuote('a b')).toBe("'a b'");
    expect(shellQuote('$(rm -rf /)')).toBe("'$(rm -rf /)'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});
