import { describe, it, expect } from 'vitest';
import { makeRecord } from '../test/fakes.js';
import { buildProcessMessage, capitalize, formatVcRecord } from './format.js';

describe('capitalize', () => {
  it('upper-cases the first letter and lower-cases the rest', () => {
    expect(capitalize('vc_name')).toBe('Vc_name');
    expect(capitalize('investment_rounds')).toBe('Investment_rounds');
  });
});

describe('formatVcRecord', () => {
  it('writes one line per field in canonical order', () => {
    expect(formatVcRecord(makeRecord(), 'https://example-vc.com')).toBe(
      'The information from the URL is the following: \n' +
        '- Vc_name: Acme Ventures\n' +
        '- Contacts: hello@acme.vc\n' +
        '- Industries: fintech, healthtech\n' +
        '- Investment_rounds: Series A, Series B\n'
    );
  });

  it('points to the website for fields with no info', () => {
    const summary = formatVcRecord(
      makeRecord({ contacts: ['no info'], investment_rounds: ['no info'] }),
      'https://example-vc.com'
    );

    expect(summary.split('\n')).toEqual([
      'The information from the URL is the following: ',
      '- Vc_name: Acme Ventures',
      '- There is not much information available about Contacts. You can check it manually by visiting the website: https://example-vc.com',
      '- Industries: fintech, healthtech',
      '- There is not much information available about Investment_rounds. You can check it manually by visiting the website: https://example-vc.com',
      '',
    ]);
  });

  it('prints the firm name as given, even when it reads no info', () => {
    const summary = formatVcRecord(makeRecord({ vc_name: 'no info' }), 'https://example-vc.com');
    expect(summary.split('\n')[1]).toBe('- Vc_name: no info');
  });

  it('treats no info alongside other values as a normal value', () => {
    const summary = formatVcRecord(makeRecord({ industries: ['no info', 'fintech'] }), 'https://example-vc.com');
    expect(summary).toContain('- Industries: no info, fintech\n');
  });
});

describe('buildProcessMessage', () => {
  it('appends the similar firm names', () => {
    const message = buildProcessMessage('summary\n', [
      { vcName: 'Acme Ventures', score: 1 },
      { vcName: 'Ledger Partners', score: 0.5 },
    ]);
    expect(message).toBe('Message: summary\n \n Similar companies: Acme Ventures, Ledger Partners');
  });
});
