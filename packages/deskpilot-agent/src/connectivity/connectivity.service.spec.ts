import { buildAgentConfig } from '../config/agent.config';
import { ConnectivityService } from './connectivity.service';

describe('ConnectivityService', () => {
  let service: ConnectivityService;

  beforeEach(() => {
    service = new ConnectivityService(
      buildAgentConfig({ DESKPILOT_CONNECTIVITY_URL: 'http://probe.test' }),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('isOnline', () => {
    it('is online when the probe URL answers 2xx', async () => {
      const fetchSpy = jest
        .spyOn(global, 'fetch')
        .mockResolvedValue(new Response('ok', { status: 200 }));

      await expect(service.isOnline()).resolves.toBe(true);
      expect(fetchSpy.mock.calls[0][0]).toBe('http://probe.test');
    });

    it('is offline on an error status', async () => {
      jest
        .spyOn(global, 'fetch')
        .mockResolvedValue(new Response('', { status: 503 }));

      await expect(service.isOnline()).resolves.toBe(false);
    });

    it('cancels the response body after checking the status', async () => {
      const cancel = jest.fn();
      const body = new ReadableStream<Uint8Array>({ cancel });
      jest
        .spyOn(global, 'fetch')
        .mockResolvedValue(new Response(body, { status: 200 }));

      await expect(service.isOnline()).resolves.toBe(true);
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it('is offline when the request fails', async () => {
      jest
        .spyOn(global, 'fetch')
        .mockRejectedValue(new TypeError('getaddrinfo ENOTFOUND'));

      await expect(service.isOnline()).resolves.toBe(false);
    });
  });

  describe('waitForConnectivity', () => {
    it('retries until the network comes back', async () => {
      const probe = jest
        .spyOn(service, 'isOnline')
        .mockResolvedValueOnce(false)
        .mockResolvedValueOnce(false)
        .mockResolvedValue(true);

      await expect(
        service.waitForConnectivity(1000, { initialDelayMs: 1 }),
      ).resolves.toBe(true);
      expect(probe).toHaveBeenCalledTimes(3);
    });

    it('gives up once the timeout has elapsed', async () => {
      const probe = jest.spyOn(service, 'isOnline').mockResolvedValue(false);

      await expect(
        service.waitForConnectivity(30, { initialDelayMs: 5, maxDelayMs: 10 }),
      ).resolves.toBe(false);
      expect(probe.mock.calls.length).toBeGreaterThanOrEqual(2);
    });

    it('probes exactly once with no time to wait', async () => {
      const probe = jest.spyOn(service, 'isOnline').mockResolvedValue(false);

      await expect(service.waitForConnectivity(0)).resolves.toBe(false);
      expect(probe).toHaveBeenCalledTimes(1);
    });
  });
});
