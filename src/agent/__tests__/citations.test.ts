/**
 * Sources Section Tests
 */

import { describe, expect, it } from 'vitest';
import { appendSources, publicSources, splitSources } from '../citations.js';
import { createSourcePolicy } from '../../search/source-policy.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';

const policy = createSourcePolicy(DEFAULT_CONFIG.policy);

describe('splitSources', () => {
  it('detaches a trailing sources section', () => {
    const { body, sources } = splitSources('...answer text...\n**Sources**\nhttp://a\nhttp://b');

    expect(body).toBe('...answer text...');
    expect(sources).toEqual(['http://a', 'http://b']);
  });

  it('strips bullets and blank lines', () => {
    const { sources } = splitSources('Answer\n\n**Sources**\n- http://a\n\n* http://b\n');

    expect(sources).toEqual(['http://a', 'http://b']);
  });

  it('splits at the last heading', () => {
    const { body, sources } = splitSources('Intro\n**Sources**\nold\nMore prose\n**Sources**\nhttp://new');

    expect(body).toBe('Intro\n**Sources**\nold\nMore prose');
    expect(sources).toEqual(['http://new']);
  });

  it('returns trimmed text when there is no heading', () => {
    expect(splitSources(' Just prose \n')).toEqual({ body: 'Just prose', sources: [] });
  });
});

describe('appendSources', () => {
  it('appends a bulleted section', () => {
    expect(appendSources('Answer.', ['http://a', 'http://b'])).toBe(
      'Answer.\n\n**Sources**\n- http://a\n- http://b'
    );
  });

  it('appends nothing for no sources', () => {
    expect(appendSources('Answer.', [])).toBe('Answer.');
  });

  it('round-trips through splitSources', () => {
    const text = appendSources('Answer.', ['https://www.govinfo.gov/x']);

    expect(splitSources(text)).toEqual({ body: 'Answer.', sources: ['https://www.govinfo.gov/x'] });
  });
});

describe('publicSources', () => {
  it('drops local paths and duplicates', () => {
    const sources = publicSources(
      [
        'https://www.federalregister.gov/d/2022-05471',
        'C:\\data\\uploads\\eo.html',
        '/home/user/data/web/page_1.html',
        ' https://www.federalregister.gov/d/2022-05471 ',
        'govinfo.gov/app/details/x',
      ],
      policy
    );

    expect(sources).toEqual(['https://www.federalregister.gov/d/2022-05471', 'govinfo.gov/app/details/x']);
  });
});
