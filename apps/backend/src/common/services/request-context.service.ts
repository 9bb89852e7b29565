import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContextStore {
  correlationId?: string;
  userId?: string;
}

/** What every log line written during a request is tagged with. */
export interface RequestLogFields {
  requestId?: string;
  userId?: string;
}

/**
 * Per-request diagnostic context, opened by RequestContextMiddleware.
 * Data-access routing never reads from here: intent is passed explicitly.
 */
@Injectable()
export class RequestContextService {
  private readonly storage = new AsyncLocalStorage<RequestContextStore>();

  runWith<T>(store: RequestContextStore, callback: () => T): T {
    return this.storage.run({ ...store }, callback);
  }

  get<K extends keyof RequestContextStore>(key: K): RequestContextStore[K] {
    return this.storage.getStore()?.[key];
  }

  /** No-op outside a request (startup, pub/sub callbacks). */
  set<K extends keyof RequestContextStore>(
    key: K,
    value: RequestContextStore[K],
  ): void {
    const store = this.storage.getStore();
    if (store) store[key] = value;
  }

  logFields(): RequestLogFields {
    const store = this.storage.getStore();
    return { requestId: store?.correlationId, userId: store?.userId };
  }
}
