import { describe, it, expect } from 'vitest';
import {
  BulkEmailResponse,
  HealthResponse,
  SendEmailRequest,
  SendEmailResponse,
  type EmailProvider,
  type SendEmailRequestInit,
} from '../../src/models.js';
import { HuefyError, ValidationError } from '../../src/errors.js';
import { requestPayloads, responsePayloads } from '../fixtures/payloads.js';

function validationErrorOf(request: SendEmailRequest): ValidationError {
  try {
    request.validate();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('Expected validate() to throw');
}

function decodeErrorOf(fn: () => unknown): HuefyError {
  try {
    fn();
  } catch (err) {
    if (err instanceof HuefyError) return err;
    throw err;
  }
  throw new Error('Expected decoding to fail');
}

describe('SendEmailRequest', () => {
  describe('validate', () => {
    it('should accept a complete request', () => {
      expect(() => new SendEmailRequest(requestPayloads.welcome).validate()).not.toThrow();
    });

    it('should accept a request without data or provider', () => {
      const request = new SendEmailRequest(requestPayloads.minimal);

      expect(request.data).toEqual({});
      expect(() => request.validate()).not.toThrow();
    });

    it('should reject a blank template key', () => {
      const err = validationErrorOf(new SendEmailRequest(requestPayloads.blankTemplate));

      expect(err.message).toBe('Template key is required');
      expect(err.field).toBe('templateKey');
    });

    it('should reject a malformed recipient', () => {
      const err = validationErrorOf(new SendEmailRequest(requestPayloads.badRecipient));

      expect(err.message).toBe('Invalid recipient email address');
      expect(err.field).toBe('recipient');
    });

    it('should report a missing recipient before its format', () => {
      const err = validationErrorOf(new SendEmailRequest({ templateKey: 'welcome-email', recipient: '' }));

      expect(err.message).toBe('Recipient email is required');
    });

    it('should check fields in order', () => {
      const err = validationErrorOf(new SendEmailRequest({ templateKey: '', recipient: 'nope' }));

      expect(err.field).toBe('templateKey');
    });

    it('should report a non-string recipient instead of throwing a TypeError', () => {
      const init: SendEmailRequestInit = JSON.parse('{"templateKey":"welcome-email","recipient":42}');
      const err = validationErrorOf(new SendEmailRequest(init));

      expect(err.message).toBe('Recipient must be a string');
      expect(err.field).toBe('recipient');
    });

    it('should reject non-string template data', () => {
      const data: Record<string, string> = JSON.parse('{"name":"John","count":5}');
      const err = validationErrorOf(new SendEmailRequest({ ...requestPayloads.minimal, data }));

      expect(err.message).toBe('Template data values must be strings');
      expect(err.field).toBe('data.count');
    });

    it('should reject an unknown provider', () => {
      const provider: EmailProvider = JSON.parse('"postmark"');
      const err = validationErrorOf(new SendEmailRequest({ ...requestPayloads.minimal, provider }));

      expect(err.message).toBe('Provider must be one of: ses, sendgrid, mailgun, mailchimp');
      expect(err.field).toBe('provider');
    });
  });

  describe('toPayload', () => {
    it('should include the provider only when set', () => {
      expect(new SendEmailRequest(requestPayloads.welcome).toPayload()).toEqual(requestPayloads.welcome);
      expect(new SendEmailRequest(requestPayloads.minimal).toPayload()).toEqual({
        templateKey: 'password-reset',
        recipient: 'jane@example.com',
        data: {},
      });
      expect('provider' in new SendEmailRequest(requestPayloads.minimal).toPayload()).toBe(false);
    });

    it('should send the trimmed template key and recipient', () => {
      const request = new SendEmailRequest({ templateKey: ' welcome ', recipient: '  user@example.com  ' });

      expect(() => request.validate()).not.toThrow();
      expect(request.toPayload()).toEqual({
        templateKey: 'welcome',
        recipient: 'user@example.com',
        data: {},
      });
    });

    it('should copy template data', () => {
      const request = new SendEmailRequest(requestPayloads.welcome);
      const payload = request.toPayload();
      payload.data.name = 'Changed';

      expect(request.data.name).toBe('John Doe');
    });

    it('should rebuild an equal request from its payload', () => {
      const payload = new SendEmailRequest(requestPayloads.welcome).toPayload();

      expect(SendEmailRequest.fromPayload(payload).toPayload()).toEqual(payload);
    });
  });
});

describe('SendEmailResponse', () => {
  it('should decode a full payload', () => {
    const response = SendEmailResponse.fromPayload(responsePayloads.sent);

    expect(response.success).toBe(true);
    expect(response.messageId).toBe('msg_123');
    expect(response.provider).toBe('sendgrid');
    expect(response.toPayload()).toEqual(responsePayloads.sent);
  });

  it('should default missing fields', () => {
    const response = SendEmailResponse.fromPayload({ messageId: 'abc' });

    expect(response.toPayload()).toEqual({ success: true, message: '', messageId: 'abc', provider: '' });
  });

  it('should reject a field of the wrong type', () => {
    const err = decodeErrorOf(() => SendEmailResponse.fromPayload({ success: 'yes' }));

    expect(err.code).toBe('INVALID_RESPONSE');
    expect(err.message).toBe('Invalid send response at success: Expected boolean, received string');
  });

  it('should reject a payload that is not an object', () => {
    const err = decodeErrorOf(() => SendEmailResponse.fromPayload('sent'));

    expect(err.message).toBe('Invalid send response: Expected object, received string');
  });
});

describe('BulkEmailResponse', () => {
  it('should decode per-recipient results', () => {
    const response = BulkEmailResponse.fromPayload(responsePayloads.bulk);

    expect(response.results).toHaveLength(2);
    expect(response.results[0]?.result).toBeInstanceOf(SendEmailResponse);
    expect(response.results[0]?.result?.messageId).toBe('msg_1');
    expect(response.results[1]?.error).toEqual({ code: 'INVALID_RECIPIENT', message: 'Mailbox unavailable' });
    expect(response.successCount).toBe(1);
    expect(response.failureCount).toBe(1);
    expect(response.allSucceeded).toBe(false);
  });

  it('should encode back to the payload it came from', () => {
    expect(BulkEmailResponse.fromPayload(responsePayloads.bulk).toPayload()).toEqual(responsePayloads.bulk);
  });

  it('should default a missing error code', () => {
    const response = BulkEmailResponse.fromPayload({
      results: [{ email: 'jane@example.com', success: false, error: { message: 'Bounced' } }],
    });

    expect(response.results[0]?.error).toEqual({ code: 'UNKNOWN_ERROR', message: 'Bounced' });
  });

  it('should treat a missing result list as empty', () => {
    const response = BulkEmailResponse.fromPayload({});

    expect(response.results).toEqual([]);
    expect(response.allSucceeded).toBe(true);
  });

  it('should require a success flag on each result', () => {
    const err = decodeErrorOf(() => BulkEmailResponse.fromPayload({ results: [{ email: 'a@example.com' }] }));

    expect(err.message).toBe('Invalid bulk response at results.0.success: Required');
  });
});

describe('HealthResponse', () => {
  it('should report healthy only for status "healthy"', () => {
    expect(HealthResponse.fromPayload(responsePayloads.healthy).isHealthy()).toBe(true);
    expect(HealthResponse.fromPayload({ status: 'degraded' }).isHealthy()).toBe(false);
  });

  it('should default missing fields', () => {
    expect(HealthResponse.fromPayload({}).toPayload()).toEqual({ status: 'unknown', timestamp: '', version: '' });
  });
});
