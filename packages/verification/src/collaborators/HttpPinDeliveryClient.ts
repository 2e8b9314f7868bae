import {
  MAX_PIN_LENGTH,
  MemberId,
  Timestamp,
  VerificationSession,
} from '@tapconsent/domain';
import { z } from 'zod';
import { CollaboratorError } from '../errors/CollaboratorError';
import type { PinDeliveryPort, PinVerificationResult } from '../types';
import { requestJson, type HttpClientOptions } from './httpJson';

const sendPinResponseSchema = z.object({
  sessionId: z.string().min(1),
  sharerId: z.string().min(1),
  expiresAt: z.string(),
  pinLength: z.number().int().min(1).max(MAX_PIN_LENGTH),
});

const verifyPinResponseSchema = z.object({
  verified: z.boolean(),
  reason: z.string().nullish(),
});

export type HttpPinDeliveryClientOptions = HttpClientOptions &
  Readonly<{
    now?: () => Timestamp;
  }>;

/**
 * PIN delivery over the backend's SMS routes.
 */
export class HttpPinDeliveryClient implements PinDeliveryPort {
  private readonly now: () => Timestamp;

  constructor(private readonly options: HttpPinDeliveryClientOptions) {
    this.now = options.now ?? (() => Timestamp.now());
  }

  async sendPin(
    request: Readonly<{ sharerId: MemberId }>
  ): Promise<VerificationSession> {
    const body = await requestJson(
      this.options,
      '/sms/send-pin',
      {
        method: 'POST',
        body: JSON.stringify({ sharerId: request.sharerId.value }),
      },
      sendPinResponseSchema
    );

    try {
      return VerificationSession.create({
        sessionId: body.sessionId,
        sharerId: MemberId.from(body.sharerId),
        createdAt: this.now(),
        expiresAt: Timestamp.fromISOString(body.expiresAt),
        pinLength: body.pinLength,
      });
    } catch (error) {
      throw new CollaboratorError(
        'Unexpected response from /sms/send-pin',
        undefined,
        body,
        { cause: error }
      );
    }
  }

  async verifyPin(
    request: Readonly<{ sessionId: string; pin: string }>
  ): Promise<PinVerificationResult> {
    const body = await requestJson(
      this.options,
      '/sms/verify-pin',
      {
        method: 'POST',
        body: JSON.stringify({ sessionId: request.sessionId, pin: request.pin }),
      },
      verifyPinResponseSchema
    );
    return { verified: body.verified, reason: body.reason ?? null };
  }
}
