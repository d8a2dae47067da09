import { describe, expect, it } from 'vitest';
import { CONTENT_TYPE_TEXT_HTML, CONTENT_TYPE_TEXT_PLAIN, buildSpecialResponse, statusLine } from './special-response.js';

function bodyText(body: unknown): string {
  if (!Buffer.isBuffer(body)) throw new Error('expected a buffered body');
  return body.toString('utf-8');
}

describe('buildSpecialResponse', () => {
  it.each([
    { status: 501, text: '501 Not Implemented' },
    { status: 502, text: '502 Bad Gateway' },
    { status: 504, text: '504 Gateway Timeout' }
  ])('answers $status with a plain status line', ({ status, text }) => {
    const response = buildSpecialResponse(status, 'plain');

    expect(response.statusCode).toBe(status);
    expect(bodyText(response.body)).toBe(text);
    expect(response.headers).toEqual({
      'content-type': CONTENT_TYPE_TEXT_PLAIN,
      'content-length': String(text.length),
      'cache-control': 'no-store'
    });
  });

  it('renders an nginx-style page', () => {
    const response = buildSpecialResponse(504, 'nginx');
    const html = bodyText(response.body);

    expect(response.headers['content-type']).toBe(CONTENT_TYPE_TEXT_HTML);
    expect(response.headers['content-length']).toBe(String(Buffer.byteLength(html)));
    expect(html.startsWith('<html>\n<head><title>504 Gateway Time-out</title></head>\n')).toBe(true);
    expect(html).toContain('<center><h1>504 Gateway Time-out</h1></center>\n<hr><center>nginx</center>\n');
    expect(html.split('<!-- a padding to disable MSIE and Chrome friendly error page -->')).toHaveLength(7);
  });
});

describe('statusLine', () => {
  it('falls back to the bare code for unknown statuses', () => {
    expect(statusLine(599)).toBe('599');
  });
});
