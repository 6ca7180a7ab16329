import { cleanForText, cleanForTts, stripLinks } from './text-cleanup';

const SINGLE_BULLET = '- **Title** (Date: 2025-09-22) read here';
const MULTI_BULLET =
  '- Bullet one.\n\n- Bullet two with [Link](https://example.com).\n\n- Final item read here';

describe.each([
  ['cleanForText', cleanForText],
  ['cleanForTts', cleanForTts],
])('%s', (_name, clean) => {
  it('removes date parentheticals', () => {
    expect(clean('Budget passes (Date: 2025-09-22).')).toBe('Budget passes.');
    expect(clean(SINGLE_BULLET)).not.toContain('(Date:');
  });

  it.each(['read here', 'view here', 'click here', 'watch more', 'listen here', 'READ HERE', 'View More'])(
    'removes the call to action "%s"',
    (phrase) => {
      expect(clean(`- Bullet. ${phrase} for details.`)).toBe('- Bullet. for details.');
    },
  );

  it('reduces markdown links to their anchor text', () => {
    expect(clean('See [Great Piece](https://example.com/article).')).toBe('See Great Piece.');
  });

  it('keeps balanced parentheses inside link targets out of the text', () => {
    expect(clean('See [Foo](https://en.wikipedia.org/wiki/Foo_(bar)) now.')).toBe('See Foo now.');
  });

  it('removes provider intro lines', () => {
    const out = clean('Hey Sam! News from Guardian – we have 3 articles\n\n- One\n- Two');
    expect(out).toBe('- One\n- Two');
  });

  it('normalizes whitespace', () => {
    expect(clean('-  Bullet   one\n\n\n- Bullet   two  \n')).toBe('- Bullet one\n\n- Bullet two');
  });

  it('leaves ordinary parentheticals and words alone', () => {
    expect(clean('Budget (provisional) approved.')).toBe('Budget (provisional) approved.');
    expect(clean('Improved readability and viewfinder settings.')).toBe(
      'Improved readability and viewfinder settings.',
    );
  });

  it.each([
    SINGLE_BULLET,
    MULTI_BULLET,
    'read click here here',
    'A [[nested]](https://x.test) link [x](y) (Date: 1) ( 2025-01-01 )',
    '  News from BBC we have\nnews from x — we have 2\n\n\n\nTail  ,  end  ',
    '**Bold** __under__ `code` ## not a heading\n## Heading\nhttps://a.test/b?c=d',
  ])('is idempotent for %j', (input) => {
    const once = clean(input);
    expect(clean(once)).toBe(once);
  });
});

describe('cleanForText vs cleanForTts', () => {
  it('keeps bare URLs for display and strips them for narration', () => {
    expect(cleanForText('Read https://example.com now.')).toBe('Read https://example.com now.');
    expect(cleanForTts('Read https://example.com now.')).toBe('Read now.');
  });

  it('removes markdown emphasis and heading markers only for narration', () => {
    const input = '## Alpha\n- **Big** story';
    expect(cleanForText(input)).toBe('## Alpha\n- **Big** story');
    expect(cleanForTts(input)).toBe('Alpha\n- Big story');
  });

  it('cleans the multi-bullet sample', () => {
    expect(cleanForText(MULTI_BULLET)).toBe('- Bullet one.\n\n- Bullet two with Link.\n\n- Final item');
    expect(cleanForTts(MULTI_BULLET)).toBe('- Bullet one.\n\n- Bullet two with Link.\n\n- Final item');
  });
});

describe('stripLinks', () => {
  it('keeps anchor text and drops bare URLs', () => {
    expect(stripLinks('- Story [Source](https://x.test/a) https://y.test/b\n- Next')).toBe(
      '- Story Source\n- Next',
    );
  });
});
