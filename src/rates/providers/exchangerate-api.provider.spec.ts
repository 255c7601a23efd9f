import { ProviderError } from '../../common/errors/wallet.errors';
import { FetchJsonOptions, JsonResponse } from '../../common/http/fetch-json';
import { ExchangeRateApiProvider } from './exchangerate-api.provider';

describe('ExchangeRateApiProvider', () => {
  const signal = new AbortController().signal;
  let http: jest.Mock<Promise<JsonResponse>, [string, FetchJsonOptions?]>;

  const provider = (apiKey = 'test-key') =>
    new ExchangeRateApiProvider({
      url: 'http://exchangerate.test/v6',
      apiKey,
      baseCurrency: 'USD',
      tracked: ['EUR', 'GBP'],
      http,
    });

  beforeEach(() => {
    http = jest.fn<Promise<JsonResponse>, [string, FetchJsonOptions?]>();
  });

  it('should list BASE_FIAT pairs', () => {
    expect(provider().pairs()).toEqual(['USD_EUR', 'USD_GBP']);
  });

  it('should read conversion_rates for tracked codes only', async () => {
    http.mockResolvedValue({
      status: 200,
      body: { result: 'success', conversion_rates: { USD: 1, EUR: 0.92, GBP: 0.79, JPY: 151.2 } },
    });

    const quote = await provider().fetchRates(signal);

    expect(http).toHaveBeenCalledWith('http://exchangerate.test/v6/test-key/latest/USD', { signal });
    expect(quote).toEqual({ rates: { USD_EUR: 0.92, USD_GBP: 0.79 }, statusCode: 200 });
  });

  it('should fail without an API key and make no request', async () => {
    await expect(provider('').fetchRates(signal)).rejects.toThrow('exchangerate: EXCHANGERATE_API_KEY is not set');
    expect(http).not.toHaveBeenCalled();
  });

  it('should surface the API error type', async () => {
    http.mockResolvedValue({ status: 200, body: { result: 'error', 'error-type': 'quota-reached' } });
    await expect(provider().fetchRates(signal)).rejects.toThrow('exchangerate: API error: quota-reached');
  });

  it('should reject a malformed payload', async () => {
    http.mockResolvedValue({ status: 200, body: ['not', 'an', 'object'] });
    await expect(provider().fetchRates(signal)).rejects.toBeInstanceOf(ProviderError);
  });
});
