import { MemberId, Timestamp } from '@tapconsent/domain';
import { describe, expect, it, vi } from 'vitest';
import { HttpPinDeliveryClient } from '../../src/collaborators/HttpPinDeliveryClient';
import { CollaboratorError } from '../../src/errors/CollaboratorError';

const T0 = Timestamp.fromISOString('2026-05-01T10:00:00.000Z');

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

const clientReturning = (respond: () => Promise<Response>) => {
  const fetchImpl = vi.fn<typeof fetch>(respond);
  const client = new HttpPinDeliveryClient({
    baseUrl: 'http://api.test/api',
    fetchImpl,
    now: () => T0,
  });
  return { client, fetchImpl };
};

const captureRejection = async (promise: Promise<unknown>) => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected a rejection');
};

describe('HttpPinDeliveryClient', () => {
  it('requests a PIN and builds the session', async () => {
    const { client, fetchImpl } = clientReturning(async () =>
      jsonResponse({
        sessionId: 'session-1',
        sharerId: 'member_001',
        expiresAt: '2026-05-01T10:02:00.000Z',
        pinLength: 4,
      })
    );

    const session = await client.sendPin({
      sharerId: MemberId.from('member_001'),
    });

    expect(fetchImpl).toHaveBeenCalledWith(
      'http://api.test/api/sms/send-pin',
      {
        method: 'POST',
        body: '{"sharerId":"member_001"}',
        headers: {
          accept: 'application/json',
          'content-type': 'application/json',
        },
      }
    );
    expect(session.sessionId).toBe('session-1');
    expect(session.sharerId.value).toBe('member_001');
    expect(session.createdAt.value).toBe(T0.value);
    expect(session.expiresAt.value).toBe(T0.plusSeconds(120).value);
    expect(session.pinLength).toBe(4);
    expect(session.simulatedPin).toBeNull();
  });

  it('verifies a PIN', async () => {
    const { client, fetchImpl } = clientReturning(async () =>
      jsonResponse({ verified: false, reason: 'Incorrect PIN' })
    );

    const result = await client.verifyPin({
      sessionId: 'session-1',
      pin: '0042',
    });

    expect(result).toEqual({ verified: false, reason: 'Incorrect PIN' });
    expect(fetchImpl.mock.calls[0][0]).toBe(
      'http://api.test/api/sms/verify-pin'
    );
    expect(fetchImpl.mock.calls[0][1]?.body).toBe(
      '{"sessionId":"session-1","pin":"0042"}'
    );
  });

  it('defaults a missing reason to null', async () => {
    const { client } = clientReturning(async () =>
      jsonResponse({ verified: true })
    );
    await expect(
      client.verifyPin({ sessionId: 'session-1', pin: '1234' })
    ).resolves.toEqual({ verified: true, reason: null });
  });

  it('surfaces the service error message on non-2xx', async () => {
    const { client } = clientReturning(async () =>
      jsonResponse({ error: 'sharerId is required' }, 400)
    );

    const error = await captureRejection(
      client.sendPin({ sharerId: MemberId.from('member_001') })
    );

    expect(error).toBeInstanceOf(CollaboratorError);
    if (!(error instanceof CollaboratorError)) return;
    expect(error.message).toBe('sharerId is required');
    expect(error.status).toBe(400);
    expect(error.payload).toEqual({ error: 'sharerId is required' });
  });

  it('wraps network failures', async () => {
    const cause = new TypeError('fetch failed');
    const { client } = clientReturning(async () => {
      throw cause;
    });

    const error = await captureRejection(
      client.verifyPin({ sessionId: 'session-1', pin: '1234' })
    );

    expect(error).toBeInstanceOf(CollaboratorError);
    if (!(error instanceof CollaboratorError)) return;
    expect(error.message).toBe(
      'Network error calling /sms/verify-pin: fetch failed'
    );
    expect(error.status).toBeUndefined();
    expect(error.cause).toBe(cause);
  });

  it('rejects a response of the wrong shape', async () => {
    const { client } = clientReturning(async () =>
      jsonResponse({ sessionId: '', pinLength: 4 })
    );

    await expect(
      client.sendPin({ sharerId: MemberId.from('member_001') })
    ).rejects.toThrow('Unexpected response from /sms/send-pin');
  });

  it('rejects an unreadable expiry', async () => {
    const { client } = clientReturning(async () =>
      jsonResponse({
        sessionId: 'session-1',
        sharerId: 'member_001',
        expiresAt: 'soon',
        pinLength: 4,
      })
    );

    const error = await captureRejection(
      client.sendPin({ sharerId: MemberId.from('member_001') })
    );
    expect(error).toBeInstanceOf(CollaboratorError);
    if (!(error instanceof CollaboratorError)) return;
    expect(error.message).toBe('Unexpected response from /sms/send-pin');
    expect(error.cause).toBeInstanceOf(Error);
  });
});
