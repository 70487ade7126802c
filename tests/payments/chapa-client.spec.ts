import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { ChapaClient, toProviderStatus } from '../../shared/payments/ChapaClient';
import { PaymentProviderError, UnknownTransactionError } from '../../shared/payments/errors';
import { testLogger } from '../helpers/fakes';

type Reply = { status: number; data: unknown } | { networkError: string };

/**
 * Client whose HTTP layer answers from a script instead of the network.
 */
function scriptedClient(...replies: Reply[]) {
  const requests: string[] = [];
  const http = axios.create({
    baseURL: 'https://chapa.test/v1',
    adapter: async (config: InternalAxiosRequestConfig) => {
      requests.push(config.url ?? '');
      const reply = replies.shift() ?? { status: 500, data: {} };

      if ('networkError' in reply) {
        throw new AxiosError(reply.networkError, 'ECONNREFUSED', config);
      }

      const response = { data: reply.data, status: reply.status, statusText: '', headers: {}, config };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { client: new ChapaClient(http, testLogger), requests };
}

const verified = (status: string) => ({
  status: 200,
  data: {
    message: 'Payment details',
    status: 'success',
    data: { tx_ref: 'tx-ref-001', status, reference: 'AP123', amount: 4800, currency: 'ETB' },
  },
});

describe('toProviderStatus', () => {
  it('maps provider statuses onto reconciliation states', () => {
    expect(toProviderStatus('success')).toBe('confirmed');
    expect(toProviderStatus(' SUCCESS ')).toBe('confirmed');
    expect(toProviderStatus('failed')).toBe('failed');
    expect(toProviderStatus('pending')).toBe('pending');
    expect(toProviderStatus('refunded')).toBe('pending');
  });
});

describe('ChapaClient', () => {
  it('verifies a transaction reference', async () => {
    const { client, requests } = scriptedClient(verified('success'));

    await expect(client.verify('tx-ref-001')).resolves.toEqual({
      transactionRef: 'tx-ref-001',
      status: 'confirmed',
      providerReference: 'AP123',
      amount: '4800',
      currency: 'ETB',
    });
    expect(requests).toEqual(['/transaction/verify/tx-ref-001']);
  });

  it('encodes the reference into the path', async () => {
    const { client, requests } = scriptedClient(verified('pending'));

    await client.verify('tx/ref 1');

    expect(requests).toEqual(['/transaction/verify/tx%2Fref%201']);
  });

  it('reports a missing reference as an unknown transaction', async () => {
    const { client } = scriptedClient({ status: 404, data: { message: 'Invalid transaction or Transaction not found' } });

    const error = await client.verify('tx-missing').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(UnknownTransactionError);
    expect(error).toMatchObject({ transient: false, statusCode: 404 });
  });

  it('treats client errors as permanent and server errors as transient', async () => {
    const { client } = scriptedClient({ status: 401, data: {} }, { status: 502, data: {} }, { status: 429, data: {} });

    await expect(client.verify('tx-1')).rejects.toMatchObject({ transient: false, statusCode: 401 });
    await expect(client.verify('tx-1')).rejects.toMatchObject({ transient: true, statusCode: 502 });
    await expect(client.verify('tx-1')).rejects.toMatchObject({ transient: true, statusCode: 429 });
  });

  it('treats network failures as transient', async () => {
    const { client } = scriptedClient({ networkError: 'connect ECONNREFUSED' });

    await expect(client.verify('tx-1')).rejects.toMatchObject({
      transient: true,
      message: 'Chapa unavailable verifying tx-1: ECONNREFUSED',
    });
  });

  it('rejects responses without transaction data', async () => {
    const { client } = scriptedClient({ status: 200, data: { status: 'failed', message: 'Invalid API key', data: null } });

    await expect(client.verify('tx-1')).rejects.toThrow(
      new PaymentProviderError('Unexpected verification response for tx-1', false)
    );
  });

  it('stops calling the provider after repeated outages', async () => {
    const outages: Reply[] = Array.from({ length: 5 }, () => ({ status: 503, data: {} }));
    const { client, requests } = scriptedClient(...outages, verified('success'));

    for (let i = 0; i < 5; i++) {
      await expect(client.verify('tx-1')).rejects.toBeInstanceOf(PaymentProviderError);
    }

    await expect(client.verify('tx-1')).rejects.toThrow('Payment provider circuit is open');
    expect(requests).toHaveLength(5);
  });
});
