import type { IncomingHttpHeaders, OutgoingHttpHeaders } from 'node:http';
import type { Headers, Request } from '../interfaces';

// RFC 7230, section 6.1
const HOP_BY_HOP_HEADERS = [
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'upgrade',
];

export class RequestUtils {
  /**
   * Extract path from the request
   * @param req
   * @returns
   */
  public static getPath(req: Request): string {
    return RequestUtils.getPathFromStr(req.url ?? '/');
  }

  /**
   * Extract path from string
   * @param str
   * @returns
   */
  public static getPathFromStr(str: string): string {
    const attributesIndex = str.indexOf('?');
    if (attributesIndex > 0) {
      str = str.substring(0, attributesIndex);
    }

    return str;
  }

  /**
   * Get client IP address, IPv4-mapped IPv6 addresses are unwrapped
   * @param req
   */
  public static getClientAddress(req: Request): string | null {
    const address = req.socket.remoteAddress;
    if (!address) {
      return null;
    }

    if (address.startsWith('::ffff:') && address.indexOf('.') > 0) {
      return address.substring(7);
    }

    return address;
  }

  /**
   * Append client address to the X-Forwarded-For header value
   * @param existing
   * @param clientAddress
   */
  public static appendForwardedFor(existing: string | string[] | undefined, clientAddress: string): string {
    const values = (Array.isArray(existing) ? existing : [existing])
      .filter((v): v is string => !!v && !!v.trim())
      .map(v => v.trim());

    values.push(clientAddress);

    return values.join(', ');
  }

  /**
   * Remove hop-by-hop headers, including the ones listed in the `Connection` header
   * @param headers
   */
  public static removeHopByHopHeaders(headers: IncomingHttpHeaders): IncomingHttpHeaders {
    const toRemove = new Set(HOP_BY_HOP_HEADERS);

    const connection = headers.connection;
    if (connection) {
      for (const name of connection.split(',')) {
        toRemove.add(name.trim().toLowerCase());
      }
    }

    const result: IncomingHttpHeaders = {};
    for (const key of Object.keys(headers)) {
      if (!toRemove.has(key.toLowerCase())) {
        result[key] = headers[key];
      }
    }

    return result;
  }

  /**
   * Prepare proxy headers
   * @param headers
   * @param headersToRewrite
   * @returns
   */
  public static prepareProxyHeaders(
    headers: IncomingHttpHeaders | OutgoingHttpHeaders,
    ...headersToRewrite: Array<Headers | undefined>
  ): OutgoingHttpHeaders {
    const outgoing: OutgoingHttpHeaders = {};

    const headersKeys = Object.keys(headers);
    const finalKeys = new Set(headersKeys.map(k => k.toLowerCase()));

    const rewriteHeaders: Record<string, string | string[]> = {};
    for (const htr of headersToRewrite) {
      if (!htr) {
        continue;
      }

      for (const key of Object.keys(htr)) {
        const lowerKey = key.toLowerCase();
        const value = htr[key];
        if (value !== null) {
          finalKeys.add(lowerKey);
          rewriteHeaders[lowerKey] = value;
        } else {
          finalKeys.delete(lowerKey);
          delete rewriteHeaders[lowerKey];
        }
      }
    }

    for (const key of finalKeys) {
      const rewriteHeader = rewriteHeaders[key];

      if (rewriteHeader !== undefined) {
        outgoing[key] = rewriteHeader;
      } else {
        const headerKey = headersKeys.find(k => k.toLowerCase() === key);
        const value = headerKey !== undefined ? headers[headerKey] : undefined;
        if (value !== undefined) {
          outgoing[key] = value;
        }
      }
    }

    return outgoing;
  }
}
