import { TextProcessor } from '../text-processing.js';

describe('TextProcessor', () => {
  it('cleans document text', () => {
    const raw = 'Intro text  here\n\n\n\nPage 3 of 12\nEnd';
    expect(TextProcessor.cleanDocumentText(raw)).toBe('Intro text here\n\nEnd');
  });

  it('returns an empty string for empty document text', () => {
    expect(TextProcessor.cleanDocumentText('')).toBe('');
  });

  it('cleans web text', () => {
    expect(TextProcessor.cleanWebText('a  \r\nb\n\n\n\nc ')).toBe('a\nb\n\nc');
  });

  it('collapses whitespace', () => {
    expect(TextProcessor.collapseWhitespace(' a \n\t b ')).toBe('a b');
  });

  it('hashes with sha1', () => {
    expect(TextProcessor.sha1('abc')).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
  });

  it('title-cases letter runs', () => {
    expect(TextProcessor.titleCase('ndis_price GUIDE 2024')).toBe('Ndis_Price Guide 2024');
  });

  it('truncates', () => {
    expect(TextProcessor.truncate('abcdef', 3)).toBe('abc');
    expect(TextProcessor.truncate('ab', 3)).toBe('ab');
  });
});
