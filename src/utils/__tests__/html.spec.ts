import { decodeEntities, extractLinks, extractTitle, htmlToText } from '../html.js';

describe('htmlToText', () => {
  it('keeps visible text and drops boilerplate blocks', () => {
    const html = [
      '<html><head><title>T</title><style>p { color: red }</style></head>',
      '<body><nav>Menu</nav><!-- hidden --><h1>Plan &amp; budget</h1>',
      '<p>Line  one\n two</p><script>var x = 1;</script><footer>Footer</footer></body></html>',
    ].join('');

    expect(htmlToText(html)).toBe('T\nPlan & budget\nLine one\ntwo');
  });
});

describe('decodeEntities', () => {
  it('decodes numeric and named entities, ampersands last', () => {
    expect(decodeEntities('&lt;b&gt; &#65;&#x42; &amp;lt; &unknown;')).toBe('<b> AB &lt; &unknown;');
  });
});

describe('extractTitle', () => {
  it('returns the collapsed title', () => {
    expect(extractTitle('<head><title> A  &amp; B </title></head>')).toBe('A & B');
  });

  it('returns undefined without a title', () => {
    expect(extractTitle('<p>none</p>')).toBeUndefined();
    expect(extractTitle('<title>  </title>')).toBeUndefined();
  });
});

describe('extractLinks', () => {
  it('resolves http(s) links against the page URL', () => {
    const html = [
      '<a href="/about">x</a>',
      "<a href='https://other.org/p'>y</a>",
      '<a href=mailto:a@b.c>z</a>',
      '<a class="c" href="page?a=1&amp;b=2">w</a>',
      '<a href="#top">t</a>',
    ].join('');

    expect(extractLinks(html, 'https://ex.org/dir/index.html')).toEqual([
      'https://ex.org/about',
      'https://other.org/p',
      'https://ex.org/dir/page?a=1&b=2',
      'https://ex.org/dir/index.html#top',
    ]);
  });
});
