import PQueue from 'p-queue';
import logger from 'jet-logger';
import { z } from 'zod';

import { ExternalServiceError } from '@src/common/util/pipeline-errors';
import type { AddressParts, ContactMetadata } from '@src/types/pipeline';


/******************************************************************************
                                   Types
******************************************************************************/

export interface EnrichmentRequest {
  address: AddressParts;
  firstName?: string;
  lastName?: string;
}

export type EnrichmentResponse =
  | { status: 'found'; contact: ContactMetadata }
  | { status: 'not_found' };

/**
 * One skip-trace vendor. Implementations throw ExternalServiceError for
 * transient failures and return `not_found` when the vendor has no data.
 */
export interface EnrichmentProvider {
  lookup(request: EnrichmentRequest, signal: AbortSignal): Promise<EnrichmentResponse>;
}

export interface EnrichmentClientOptions {
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
  concurrency: number;
}


/******************************************************************************
                               HTTP provider
******************************************************************************/

const ProviderResponseSchema = z.object({
  result: z.array(z.object({
    names: z.array(z.object({
      first: z.string().optional(),
      last: z.string().optional(),
      full: z.string().optional(),
    })).default([]),
    phones: z.array(z.object({
      number: z.string(),
      type: z.string().optional(),
      carrier: z.string().optional(),
      lastSeen: z.string().optional(),
    })).default([]),
    emails: z.array(z.object({
      address: z.string(),
    })).default([]),
    addresses: z.array(z.object({
      street: z.string(),
      city: z.string().default(''),
      state: z.string().default(''),
      zip: z.string().default(''),
      lastSeen: z.string().optional(),
    })).default([]),
  })).default([]),
});

type ProviderResponse = z.infer<typeof ProviderResponseSchema>;

/**
 * Skip-trace vendor reached over HTTP with a bearer key.
 *
 * POST {baseUrl}/search  { street, city, state, zip, firstName?, lastName? }
 */
export class HttpSkipTraceProvider implements EnrichmentProvider {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
  ) {}

  async lookup(request: EnrichmentRequest, signal: AbortSignal): Promise<EnrichmentResponse> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl.replace(/\/$/, '')}/search`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          street: request.address.street,
          city: request.address.city,
          state: request.address.state,
          zip: request.address.zipcode,
          firstName: request.firstName,
          lastName: request.lastName,
        }),
        signal,
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        throw new ExternalServiceError('timeout', 'Skip-trace request timed out');
      }
      throw new ExternalServiceError('service_error', `Skip-trace request failed: ${describe(error)}`);
    }

    if (response.status === 404) {
      return { status: 'not_found' };
    }
    if (response.status === 429) {
      throw new ExternalServiceError('rate_limited', 'Skip-trace provider rate limit reached');
    }
    if (!response.ok) {
      throw new ExternalServiceError('service_error', `Skip-trace provider responded ${response.status}`);
    }

    const parsed = ProviderResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError('service_error', `Unexpected skip-trace response: ${parsed.error.message}`);
    }
    return toEnrichmentResponse(parsed.data);
  }
}

/**
 * A hit is any phone, email or address for the lookup; names alone do not
 * count.
 */
export function toEnrichmentResponse(body: ProviderResponse): EnrichmentResponse {
  const contact: ContactMetadata = {
    ownerNames: [],
    phones: [],
    emails: [],
    addressHistory: [],
  };

  for (const person of body.result) {
    for (const name of person.names) {
      const full = name.full ?? [name.first, name.last].filter(Boolean).join(' ');
      if (full && !contact.ownerNames.includes(full)) {
        contact.ownerNames.push(full);
      }
    }
    for (const phone of person.phones) {
      const number = phone.number.replace(/\D/g, '');
      if (number && !contact.phones.some((p) => p.number === number)) {
        contact.phones.push({ ...phone, number });
      }
    }
    for (const email of person.emails) {
      const address = email.address.trim().toLowerCase();
      if (address && !contact.emails.includes(address)) {
        contact.emails.push(address);
      }
    }
    for (const address of person.addresses) {
      contact.addressHistory.push({
        street: address.street,
        city: address.city,
        state: address.state,
        zipcode: address.zip,
        lastSeen: address.lastSeen,
      });
    }
  }

  const hit = contact.phones.length > 0 || contact.emails.length > 0 || contact.addressHistory.length > 0;
  return hit ? { status: 'found', contact } : { status: 'not_found' };
}


/******************************************************************************
                                  Client
******************************************************************************/

/**
 * Enrichment Client
 *
 * Wraps a provider with the limits every paid call goes through:
 * - p-queue caps concurrent provider calls and enforces a hard timeout per call
 * - transient failures are retried with exponential backoff
 * - after the last attempt the ExternalServiceError reaches the caller
 */
export class EnrichmentClient {
  private readonly queue: PQueue;

  constructor(
    private readonly provider: EnrichmentProvider,
    private readonly options: EnrichmentClientOptions,
  ) {
    this.queue = new PQueue({
      concurrency: options.concurrency,
      timeout: options.timeoutMs,
      throwOnTimeout: true,
      autoStart: true,
    });

    this.queue.on('active', () => {
      logger.info(
        `🔄 Skip-trace queue active - Running: ${this.queue.pending}/${options.concurrency}, Waiting: ${this.queue.size}`,
      );
    });
  }

  async lookup(request: EnrichmentRequest): Promise<EnrichmentResponse> {
    const { maxAttempts, backoffMs } = this.options;
    let lastError = new ExternalServiceError('service_error', 'Skip-trace lookup was not attempted');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.attempt(request);
      } catch (error) {
        lastError = toExternalError(error, this.options.timeoutMs);
        logger.warn(`⚠️ Skip-trace attempt ${attempt}/${maxAttempts} failed (${lastError.kind}): ${lastError.message}`);

        if (attempt < maxAttempts) {
          const wait = backoffMs * 2 ** (attempt - 1);
          await new Promise((resolve) => setTimeout(resolve, wait));
        }
      }
    }

    logger.err(`❌ Skip-trace lookup gave up after ${maxAttempts} attempts: ${lastError.message}`);
    throw lastError;
  }

  getStats() {
    return {
      size: this.queue.size,
      pending: this.queue.pending,
      concurrency: this.options.concurrency,
    };
  }

  private attempt(request: EnrichmentRequest): Promise<EnrichmentResponse> {
    return this.queue.add(() => {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
      return this.provider
        .lookup(request, controller.signal)
        .finally(() => clearTimeout(timer));
    });
  }
}

function toExternalError(error: unknown, timeoutMs: number): ExternalServiceError {
  if (error instanceof ExternalServiceError) {
    return error;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new ExternalServiceError('timeout', `Skip-trace call exceeded ${timeoutMs}ms`);
  }
  return new ExternalServiceError('service_error', describe(error));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
