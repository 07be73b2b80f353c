/**
 * Unit tests for the BioMart HTTP client
 */

import { describe, it, expect } from '@jest/globals';
import { BioMartClient } from '../../src/biomart/biomart-client';
import { TransportError } from '../../src/errors';
import { RecordingHttpGetter } from '../helpers/fake-sources';

const ENDPOINT = 'http://biomart.test/martservice/';

describe('BioMartClient', () => {
  it('should send the payload as the query parameter', async () => {
    const http = new RecordingHttpGetter({ status: 200, data: 'A\tB\n' });
    const client = new BioMartClient(ENDPOINT, http);

    await client.query('<Query a="1"/>');

    expect(http.urls).toEqual(['http://biomart.test/martservice/?query=%3CQuery+a%3D%221%22%2F%3E']);
  });

  it('should return the body of a 200 response', async () => {
    const client = new BioMartClient(ENDPOINT, new RecordingHttpGetter({ status: 200, data: 'ENSG1\tABC\n' }));

    await expect(client.query('<Query/>')).resolves.toBe('ENSG1\tABC\n');
  });

  it('should return an empty string for an empty body', async () => {
    const client = new BioMartClient(ENDPOINT, new RecordingHttpGetter({ status: 200, data: '' }));

    await expect(client.query('<Query/>')).resolves.toBe('');
  });

  it('should raise a TransportError carrying status and URL', async () => {
    const client = new BioMartClient(ENDPOINT, new RecordingHttpGetter({ status: 503, data: 'busy' }));

    const error = await client.query('<Query/>').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      statusCode: 503,
      url: 'http://biomart.test/martservice/?query=%3CQuery%2F%3E',
      code: 'TRANSPORT_ERROR',
    });
  });

  it('should treat any non-200 success status as a failure', async () => {
    const http = new RecordingHttpGetter({ status: 204, data: '' });
    const client = new BioMartClient(ENDPOINT, http);

    await expect(client.query('<Query/>')).rejects.toThrow('status code 204');
    expect(http.urls).toHaveLength(1);
  });
});
