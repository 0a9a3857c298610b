import type { Msg, Subscription } from 'nats';

/**
 * Pull-style view of a subscription. `poll` waits at most `timeoutMs` for
 * the next payload and resolves null when none arrived in time.
 */
export interface MessageSource {
    poll(timeoutMs: number): Promise<Uint8Array | null>;
    isClosed(): boolean;
    close(): void;
}

export type SubscriptionLike = AsyncIterable<Pick<Msg, 'data'>> & Pick<Subscription, 'unsubscribe'>;

export class NatsMessageSource implements MessageSource {
    private iterator: AsyncIterator<Pick<Msg, 'data'>>;
    // A next() that outlived its poll; the following poll resumes it so no message is skipped.
    private pending: Promise<IteratorResult<Pick<Msg, 'data'>>> | null = null;
    private closed = false;

    constructor(private subscription: SubscriptionLike) {
        this.iterator = subscription[Symbol.asyncIterator]();
    }

    async poll(timeoutMs: number): Promise<Uint8Array | null> {
        if (this.closed) {
            return null;
        }

        let next = this.pending;
        if (!next) {
            next = this.iterator.next();
            // a rejection is surfaced to whichever poll awaits `next`
            next.catch(() => undefined);
            this.pending = next;
        }

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<'timeout'>((resolve) => {
            timer = setTimeout(() => resolve('timeout'), timeoutMs);
        });

        try {
            const result = await Promise.race([next, timeout]);
            if (result === 'timeout') {
                return null;
            }

            this.pending = null;
            if (result.done) {
                this.closed = true;
                return null;
            }
            return result.value.data;
        } catch (err) {
            this.pending = null;
            throw err;
        } finally {
            clearTimeout(timer);
        }
    }

    isClosed(): boolean {
        return this.closed;
    }

    close(): void {
        if (!this.closed) {
            this.closed = true;
            this.subscription.unsubscribe();
        }
    }
}
