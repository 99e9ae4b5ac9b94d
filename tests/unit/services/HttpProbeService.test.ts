import { AxiosError } from 'axios';
import { DEFAULT_USER_AGENT } from '../../../src/config/CheckerConfig';
import { HttpProbeService, classifyProbeError } from '../../../src/services/HttpProbeService';

function page(status: number, data: string, responseUrl: string) {
  return { status, data, headers: {}, request: { res: { responseUrl } } };
}

describe('HttpProbeService', () => {
  let get: jest.Mock;
  let sleepFn: jest.Mock;
  let service: HttpProbeService;

  beforeEach(() => {
    get = jest.fn();
    sleepFn = jest.fn().mockResolvedValue(undefined);
    service = new HttpProbeService({ client: { get }, sleepFn });
  });

  describe('Strategy Interface Implementation', () => {
    test('should return correct strategy name', () => {
      expect(service.getName()).toBe('HttpProbeService');
    });

    test('should return default configuration', () => {
      expect(service.getConfig()).toEqual({
        timeoutMs: 15000,
        maxRetries: 1,
        retryDelayMs: 1000,
        useExponentialBackoff: false
      });
    });

    test('should pass timeout, redirect limit and user agent to the client', async () => {
      service.setConfig({ timeoutMs: 2500 });
      get.mockResolvedValue(page(204, '', 'https://example.com/'));

      await service.probe('example.com');

      expect(get).toHaveBeenCalledWith(
        'https://example.com',
        expect.objectContaining({
          timeout: 2500,
          maxRedirects: 30,
          headers: expect.objectContaining({ 'User-Agent': DEFAULT_USER_AGENT })
        })
      );
    });
  });

  describe('Page reading', () => {
    test('should extract title and text and analyze the page', async () => {
      get.mockResolvedValue(
        page(
          200,
          '<html><head><title>Ahoy — Welcome</title></head>' +
            '<body><p>This domain is for sale.</p><p>Make an offer today.</p></body></html>',
          'https://example.com/'
        )
      );

      const result = await service.probe('example.com');

      expect(result).toEqual({
        statusCode: 200,
        finalUrl: 'https://example.com/',
        pageTitle: 'Ahoy — Welcome',
        bodyText: 'ahoy — welcome this domain is for sale. make an offer today.',
        isParked: true,
        isForSale: true
      });
      expect(get).toHaveBeenCalledTimes(1);
    });

    test('should analyze the whole text but store only the first 5000 characters', async () => {
      get.mockResolvedValue(
        page(200, `<html><body><p>${'a'.repeat(6000)}</p><p>buy this domain</p></body></html>`, 'https://example.com/')
      );

      const result = await service.probe('example.com');

      expect(result.bodyText).toBe('a'.repeat(5000));
      expect(result.isForSale).toBe(true);
      expect(result.pageTitle).toBeUndefined();
    });

    test('should not read the body of a non-200 response', async () => {
      get.mockResolvedValue(page(404, '<html><title>Domain for sale</title></html>', 'https://example.com/'));

      const result = await service.probe('example.com');

      expect(result).toEqual({
        statusCode: 404,
        finalUrl: 'https://example.com/',
        bodyText: '',
        isParked: false,
        isForSale: false
      });
    });
  });

  describe('Redirect detection', () => {
    test('should record a redirect to another registrable domain', async () => {
      get.mockResolvedValue(page(200, '', 'https://www.example.org/'));

      const result = await service.probe('example.net');

      expect(result.redirectUrl).toBe('https://www.example.org/');
      expect(result.finalUrl).toBe('https://www.example.org/');
    });

    test('should record a redirect that ends on an error page without reading it', async () => {
      get.mockResolvedValue(
        page(404, '<html><head><title>Gone</title></head><body>this domain is for sale</body></html>', 'https://www.other.org/')
      );

      const result = await service.probe('example.net');

      expect(result).toEqual({
        statusCode: 404,
        finalUrl: 'https://www.other.org/',
        redirectUrl: 'https://www.other.org/',
        bodyText: '',
        isParked: false,
        isForSale: false
      });
    });

    test('should treat the www host of the same domain as the same site', async () => {
      get.mockResolvedValue(page(200, '', 'https://www.example.com/home'));

      const result = await service.probe('example.com');

      expect(result.redirectUrl).toBeUndefined();
      expect(result.finalUrl).toBe('https://www.example.com/home');
    });

    test('should fall back to the requested URL when the final URL is unknown', async () => {
      get.mockResolvedValue({ status: 200, data: '', headers: {}, request: {} });

      const result = await service.probe('example.com');

      expect(result.finalUrl).toBe('https://example.com');
      expect(result.redirectUrl).toBeUndefined();
    });
  });

  describe('Failure handling', () => {
    test('should move to HTTP straight after a TLS failure', async () => {
      get
        .mockRejectedValueOnce(new AxiosError('self-signed certificate', 'DEPTH_ZERO_SELF_SIGNED_CERT'))
        .mockResolvedValueOnce(page(200, '', 'http://example.com/'));

      const result = await service.probe('example.com');

      expect(get).toHaveBeenCalledTimes(2);
      expect(get.mock.calls[1]?.[0]).toBe('http://example.com');
      expect(sleepFn).not.toHaveBeenCalled();
      expect(result.statusCode).toBe(200);
      expect(result.error).toBeUndefined();
    });

    test('should retry each scheme once and record a refused connection', async () => {
      get.mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));

      const result = await service.probe('example.com');

      expect(get).toHaveBeenCalledTimes(4);
      expect(sleepFn).toHaveBeenCalledTimes(2);
      expect(sleepFn).toHaveBeenCalledWith(1000);
      expect(result).toEqual({
        bodyText: '',
        isParked: false,
        isForSale: false,
        error: 'Connection refused',
        errorKind: 'connection'
      });
    });

    test('should record a timeout', async () => {
      get.mockRejectedValue(new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED'));

      const result = await service.probe('example.com');

      expect(result.error).toBe('Timeout');
      expect(result.errorKind).toBe('timeout');
      expect(result.statusCode).toBeUndefined();
    });

    test('should keep the message of other transport errors, truncated', async () => {
      get.mockRejectedValue(new Error('x'.repeat(300)));

      const result = await service.probe('example.com');

      expect(result.error).toBe('x'.repeat(200));
      expect(result.errorKind).toBe('transport');
    });

    test('should stop retrying once a response arrives', async () => {
      get
        .mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET'))
        .mockResolvedValueOnce(page(503, '', 'https://example.com/'));

      const result = await service.probe('example.com');

      expect(get).toHaveBeenCalledTimes(2);
      expect(get.mock.calls[1]?.[0]).toBe('https://example.com');
      expect(result.statusCode).toBe(503);
    });
  });

  describe('classifyProbeError', () => {
    test.each([
      ['ECONNREFUSED', 'connection'],
      ['ENOTFOUND', 'connection'],
      ['ETIMEDOUT', 'timeout'],
      ['ECONNABORTED', 'timeout'],
      ['CERT_HAS_EXPIRED', 'tls'],
      ['ERR_TLS_CERT_ALTNAME_INVALID', 'tls'],
      ['SELF_SIGNED_CERT_IN_CHAIN', 'tls'],
      ['ERR_BAD_RESPONSE', 'transport']
    ])('should classify %s as %s', (code, kind) => {
      expect(classifyProbeError(new AxiosError('failed', code))).toBe(kind);
    });

    test('should read the code of plain errors', () => {
      const error = Object.assign(new Error('getaddrinfo EAI_AGAIN'), { code: 'EAI_AGAIN' });

      expect(classifyProbeError(error)).toBe('connection');
    });

    test('should treat values without a code as transport errors', () => {
      expect(classifyProbeError('boom')).toBe('transport');
    });
  });
});
