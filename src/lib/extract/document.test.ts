import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import AdmZip from 'adm-zip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { NotFoundError, UnsupportedDocumentError } from '@/lib/errors';
import {
  decodeText,
  extractDocxText,
  extractText,
} from '@/lib/extract/document';

function docx(paragraphs: string): Buffer {
  const zip = new AdmZip();
  zip.addFile(
    'word/document.xml',
    Buffer.from(
      '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
        '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
        `<w:body>${paragraphs}</w:body></w:document>`,
      'utf8',
    ),
  );
  return zip.toBuffer();
}

const paragraphs =
  '<w:p><w:r><w:t>6 Апреля, Понедельник</w:t></w:r></w:p>' +
  '<w:p/>' +
  '<w:p><w:r><w:t xml:space="preserve">08:00 </w:t></w:r><w:r><w:t>Литургия</w:t></w:r>' +
  '<w:r><w:tab/><w:t>хор</w:t></w:r></w:p>';

describe('decodeText', () => {
  it('reads utf-8 and drops a byte order mark', () => {
    expect(decodeText(Buffer.from('\uFEFFМая, Среда', 'utf8'))).toBe('Мая, Среда');
  });

  it('falls back to windows-1251', () => {
    expect(decodeText(Buffer.from([0xcc, 0xe0, 0xff]))).toBe('Мая');
  });
});

describe('extractDocxText', () => {
  it('joins non-blank body paragraphs with newlines', () => {
    expect(extractDocxText(docx(paragraphs))).toBe(
      '6 Апреля, Понедельник\n08:00 Литургия\tхор',
    );
  });

  it('rejects archives without a document part', () => {
    const zip = new AdmZip();
    zip.addFile('readme.txt', Buffer.from('x'));
    expect(() => extractDocxText(zip.toBuffer())).toThrow(
      'DOCX archive has no word/document.xml',
    );
  });
});

describe('extractText', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'schedule-extract-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('dispatches on the file extension', async () => {
    const txt = path.join(dir, 'may.txt');
    const word = path.join(dir, 'april.DOCX');
    writeFileSync(txt, 'Мая, Среда\n10:00 Акафист');
    writeFileSync(word, docx(paragraphs));

    expect(await extractText(txt)).toBe('Мая, Среда\n10:00 Акафист');
    expect(await extractText(word)).toBe('6 Апреля, Понедельник\n08:00 Литургия\tхор');
  });

  it('rejects missing files and unknown formats', async () => {
    await expect(extractText(path.join(dir, 'none.txt'))).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(extractText(path.join(dir, 'scan.pdf'))).rejects.toBeInstanceOf(
      UnsupportedDocumentError,
    );
  });
});
