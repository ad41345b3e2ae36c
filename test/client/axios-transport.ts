import { describe, it } from 'mocha';
import { expect } from 'chai';
import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import AxiosTransport from '../../app/client/axios-transport';
import env from '../../app/util/env';
import { TransportError } from '../../app/util/errors';

describe('client/axios-transport', function () {
  const instance = axios.create();
  const transport = new AxiosTransport(instance, 1000);
  let mock: MockAdapter;

  beforeEach(function () {
    mock = new MockAdapter(instance);
  });

  afterEach(function () {
    mock.restore();
  });

  describe('when the service responds', function () {
    it('returns the status, lower case headers and the body as bytes', async function () {
      mock.onGet('https://edr.example.com/collections').reply(200, '{"collections":[]}', { 'Content-Type': 'application/json' });
      const response = await transport.send({ method: 'GET', url: 'https://edr.example.com/collections', headers: {} });
      expect(response.status).to.equal(200);
      expect(response.headers['content-type']).to.equal('application/json');
      expect(response.contentType).to.equal('application/json');
      expect(response.body.toString('utf8')).to.equal('{"collections":[]}');
    });

    it('resolves error statuses', async function () {
      mock.onGet('https://edr.example.com/collections/missing').reply(404, '{"description":"Not found"}');
      const response = await transport.send({ method: 'GET', url: 'https://edr.example.com/collections/missing', headers: {} });
      expect(response.status).to.equal(404);
      expect(response.contentType).to.equal(undefined);
    });

    it('sends the user agent, the request headers and the body', async function () {
      mock.onPost('https://edr.example.com/collections/metar/position').reply(200, '{}');
      await transport.send({
        method: 'POST',
        url: 'https://edr.example.com/collections/metar/position',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Authorization: 'Bearer test-secret' },
        body: 'coords=POINT%2810+50%29',
      });
      const [sent] = mock.history.post;
      expect(sent.data).to.equal('coords=POINT%2810+50%29');
      expect(sent.headers?.['User-Agent']).to.equal(env.userAgent);
      expect(sent.headers?.Authorization).to.equal('Bearer test-secret');
    });
  });

  describe('when the request fails', function () {
    it('rejects with a TransportError', async function () {
      mock.onGet('https://edr.example.com/').networkError();
      await expect(transport.send({ method: 'GET', url: 'https://edr.example.com/', headers: {} }))
        .to.be.rejectedWith(TransportError, 'GET https://edr.example.com/ failed: Network Error');
    });
  });
});
