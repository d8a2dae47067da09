import { STATUS_CODES } from 'node:http';
import type { ErrorPageStyle, OutgoingResponse } from '../types/index.js';

export const CONTENT_TYPE_TEXT_PLAIN = 'text/plain; charset=utf-8';
export const CONTENT_TYPE_TEXT_HTML = 'text/html; charset=utf-8';

const NGINX_TITLES: Record<number, string> = {
  500: '500 Internal Server Error',
  501: '501 Not Implemented',
  502: '502 Bad Gateway',
  504: '504 Gateway Time-out'
};

export function statusLine(statusCode: number): string {
  const reason = STATUS_CODES[statusCode];
  return reason ? `${statusCode} ${reason}` : String(statusCode);
}

// Mimics nginx's built-in error pages, padding included so browsers do not swap in their own
function nginxPage(statusCode: number): string {
  const title = NGINX_TITLES[statusCode] ?? String(statusCode);
  const padding = '<!-- a padding to disable MSIE and Chrome friendly error page -->\n'.repeat(6);

  return (
    '<html>\n' +
    `<head><title>${title}</title></head>\n` +
    '<body>\n' +
    `<center><h1>${title}</h1></center>\n` +
    '<hr><center>nginx</center>\n' +
    '</body>\n' +
    '</html>\n' +
    padding
  );
}

export function buildSpecialResponse(statusCode: number, style: ErrorPageStyle): OutgoingResponse {
  const html = style === 'nginx';
  const body = Buffer.from(html ? nginxPage(statusCode) : statusLine(statusCode), 'utf-8');

  return {
    statusCode,
    headers: {
      'content-type': html ? CONTENT_TYPE_TEXT_HTML : CONTENT_TYPE_TEXT_PLAIN,
      'content-length': String(body.length),
      'cache-control': 'no-store'
    },
    body
  };
}
