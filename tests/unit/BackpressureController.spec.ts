/**
 * Unit Tests: Backpressure Controller
 *
 * Admission policy, priority promotion, queue expiry, cancellation and the
 * error-rate gate.
 *
 * @see libs/backpressure/controller.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { BackpressureController, ControllerView, Lease } from '../../libs/backpressure/controller.js';
import { LoadSnapshot } from '../../libs/backpressure/loadSnapshot.js';
import { OrchestrationError } from '../../libs/errors/sanitizer.js';
import { backpressureSettings, expectAdmit, expectQueue, TestClock } from '../helpers/fixtures.js';

function failureKind(kind: string) {
    return (error: unknown) => error instanceof OrchestrationError && error.kind === kind;
}

describe('BackpressureController', () => {
    it('admits up to capacity, then queues, then rejects', () => {
        const controller = new BackpressureController(backpressureSettings({ capacity: 2, queueBound: 1, queueWaitMs: 1_500 }));

        expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' }));
        expectAdmit(controller.admit({ requestId: 'r2', priority: 'interactive' }));
        const { position, ticket } = expectQueue(controller.admit({ requestId: 'r3', priority: 'batch' }));
        assert.strictEqual(position, 1);
        assert.strictEqual(ticket.position(), 1);

        const rejected = controller.admit({ requestId: 'r4', priority: 'interactive' });
        assert.deepStrictEqual(rejected, { kind: 'reject', reason: 'CapacityExceeded', retryAfterSeconds: 2 });

        const view = controller.snapshot();
        assert.strictEqual(view.inFlight, 2);
        assert.strictEqual(view.queueDepth.total, 1);
        assert.deepStrictEqual(
            [view.counters.admitted, view.counters.queued, view.counters.rejected],
            [2, 1, 1]
        );

        controller.close();
        return assert.rejects(ticket.promoted, failureKind('Cancelled'));
    });

    it('queues a third interactive request at position one and promotes it when a slot frees', async () => {
        const controller = new BackpressureController(backpressureSettings({ capacity: 2, queueBound: 2 }));
        const first = expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' }));
        expectAdmit(controller.admit({ requestId: 'r2', priority: 'interactive' }));
        const third = expectQueue(controller.admit({ requestId: 'r3', priority: 'interactive' }));
        assert.strictEqual(third.position, 1);

        first.release('success');
        const promoted = await third.ticket.promoted;
        assert.strictEqual(promoted.requestId, 'r3');

        const view = controller.snapshot();
        assert.strictEqual(view.inFlight, 2);
        assert.strictEqual(view.queueDepth.total, 0);
        assert.strictEqual(view.counters.promoted, 1);
    });

    it('promotes interactive work ahead of batch on release', async () => {
        const controller = new BackpressureController(backpressureSettings({ capacity: 1, queueBound: 4 }));
        const first = expectAdmit(controller.admit({ requestId: 'r1', priority: 'batch' }));
        const batch = expectQueue(controller.admit({ requestId: 'b1', priority: 'batch' }));
        const interactive = expectQueue(controller.admit({ requestId: 'i1', priority: 'interactive' }));

        assert.strictEqual(interactive.position, 1);
        assert.strictEqual(batch.ticket.position(), 2);

        first.release('success');
        const promoted = await interactive.ticket.promoted;
        assert.strictEqual(promoted.requestId, 'i1');
        assert.strictEqual(interactive.ticket.position(), undefined);
        assert.strictEqual(batch.ticket.position(), 1);

        promoted.release('success');
        const next = await batch.ticket.promoted;
        assert.strictEqual(next.requestId, 'b1');
        next.release('success');

        const view = controller.snapshot();
        assert.strictEqual(view.inFlight, 0);
        assert.strictEqual(view.counters.promoted, 2);
        assert.strictEqual(view.counters.completed, 3);
    });

    it('does not admit past queued work when a slot frees up', async () => {
        const controller = new BackpressureController(backpressureSettings({ capacity: 1, queueBound: 4 }));
        const first = expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' }));
        const queued = expectQueue(controller.admit({ requestId: 'r2', priority: 'batch' }));

        first.release('neutral');
        const next = controller.admit({ requestId: 'r3', priority: 'interactive' });
        assert.strictEqual(next.kind, 'queue');

        const lease = await queued.ticket.promoted;
        assert.strictEqual(lease.requestId, 'r2');
        controller.close();
        if (next.kind === 'queue') await assert.rejects(next.ticket.promoted, failureKind('Cancelled'));
    });

    it('expires queued work after the queue-wait bound', async () => {
        const controller = new BackpressureController(backpressureSettings({ capacity: 1, queueWaitMs: 20 }));
        expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' }));
        const { ticket } = expectQueue(controller.admit({ requestId: 'r2', priority: 'interactive' }));

        await assert.rejects(ticket.promoted, failureKind('QueueTimeout'));
        const view = controller.snapshot();
        assert.strictEqual(view.queueDepth.total, 0);
        assert.strictEqual(view.counters.queueTimeouts, 1);
    });

    it('removes a cancelled ticket from the queue', async () => {
        const controller = new BackpressureController(backpressureSettings({ capacity: 1 }));
        const lease = expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' }));
        const { ticket } = expectQueue(controller.admit({ requestId: 'r2', priority: 'interactive' }));

        const rejection = assert.rejects(ticket.promoted, failureKind('Cancelled'));
        ticket.cancel();
        await rejection;

        lease.release('success');
        const view = controller.snapshot();
        assert.strictEqual(view.inFlight, 0);
        assert.strictEqual(view.counters.cancelled, 1);
        assert.strictEqual(view.counters.promoted, 0);
    });

    it('cancels a queued ticket when its signal aborts', async () => {
        const controller = new BackpressureController(backpressureSettings({ capacity: 1 }));
        expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' }));
        const abort = new AbortController();
        const { ticket } = expectQueue(controller.admit({ requestId: 'r2', priority: 'batch' }, { signal: abort.signal }));

        const rejection = assert.rejects(ticket.promoted, failureKind('Cancelled'));
        abort.abort();
        await rejection;
        assert.strictEqual(controller.snapshot().queueDepth.batch, 0);
    });

    it('throws Cancelled for an already aborted signal', () => {
        const controller = new BackpressureController(backpressureSettings());
        const abort = new AbortController();
        abort.abort();
        assert.throws(() => controller.admit({ requestId: 'r1', priority: 'interactive' }, { signal: abort.signal }), failureKind('Cancelled'));
        assert.strictEqual(controller.snapshot().inFlight, 0);
    });

    it('releases a lease only once', () => {
        const controller = new BackpressureController(backpressureSettings());
        const lease = expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' }));
        lease.release('failure');
        lease.release('failure');

        const view = controller.snapshot();
        assert.strictEqual(lease.released, true);
        assert.strictEqual(view.inFlight, 0);
        assert.strictEqual(view.window.samples, 1);
        assert.strictEqual(view.counters.failed, 1);
    });

    it('does not record neutral outcomes in the error window', () => {
        const controller = new BackpressureController(backpressureSettings());
        expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' })).release('neutral');
        assert.strictEqual(controller.snapshot().window.samples, 0);
    });

    it('halves capacity when the error rate passes the threshold and recovers after cooldown', async () => {
        const clock = new TestClock();
        const controller = new BackpressureController(
            backpressureSettings({ capacity: 4, errorWindow: 4, errorMinSamples: 2, errorThreshold: 0.5, cooldownMs: 1_000 }),
            new LoadSnapshot(4),
            clock.now
        );

        const a = expectAdmit(controller.admit({ requestId: 'a', priority: 'interactive' }));
        const b = expectAdmit(controller.admit({ requestId: 'b', priority: 'interactive' }));
        a.release('failure');
        assert.strictEqual(controller.isDegraded, false);
        b.release('failure');
        assert.strictEqual(controller.isDegraded, true);
        assert.strictEqual(controller.effectiveCapacity, 2);

        const c = expectAdmit(controller.admit({ requestId: 'c', priority: 'interactive' }));
        const d = expectAdmit(controller.admit({ requestId: 'd', priority: 'interactive' }));
        const overflow = expectQueue(controller.admit({ requestId: 'e', priority: 'batch' }));
        const overflowRejected = assert.rejects(overflow.ticket.promoted, failureKind('Cancelled'));
        overflow.ticket.cancel();
        await overflowRejected;

        c.release('success');
        d.release('success');
        // Two failures in four: exactly at the threshold, not yet recovered
        clock.advance(1_000);
        assert.strictEqual(controller.snapshot().degraded, true);

        expectAdmit(controller.admit({ requestId: 'f', priority: 'interactive' })).release('success');
        clock.advance(999);
        assert.strictEqual(controller.snapshot().degraded, true);

        clock.advance(1);
        const view = controller.snapshot();
        assert.strictEqual(view.degraded, false);
        assert.strictEqual(view.effectiveCapacity, 4);
    });

    it('restarts the cooldown when the rate goes back over the threshold', () => {
        const clock = new TestClock();
        const controller = new BackpressureController(
            backpressureSettings({ capacity: 4, errorWindow: 2, errorMinSamples: 2, errorThreshold: 0.5, cooldownMs: 100 }),
            new LoadSnapshot(2),
            clock.now
        );
        let seq = 0;
        const run = (outcome: 'success' | 'failure') =>
            expectAdmit(controller.admit({ requestId: `r${seq++}`, priority: 'interactive' })).release(outcome);

        run('failure');
        run('failure');
        assert.strictEqual(controller.isDegraded, true);

        run('success');
        run('success');
        clock.advance(60);
        run('failure');
        run('success');
        assert.strictEqual(controller.snapshot().window.failures, 1);
        run('success');
        clock.advance(60);
        assert.strictEqual(controller.snapshot().degraded, true);
        clock.advance(40);
        assert.strictEqual(controller.snapshot().degraded, false);
    });

    it('never drops effective capacity below one', () => {
        const controller = new BackpressureController(backpressureSettings({ capacity: 1, errorMinSamples: 1, errorWindow: 1 }), new LoadSnapshot(1));
        expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' })).release('failure');
        assert.strictEqual(controller.isDegraded, true);
        assert.strictEqual(controller.effectiveCapacity, 1);
    });

    it('notifies listeners until they unsubscribe', () => {
        const controller = new BackpressureController(backpressureSettings());
        const views: ControllerView[] = [];
        const unsubscribe = controller.onChange(view => views.push(view));

        const lease = expectAdmit(controller.admit({ requestId: 'r1', priority: 'interactive' }));
        assert.strictEqual(views.length, 1);
        assert.strictEqual(views[0]?.inFlight, 1);

        unsubscribe();
        lease.release('success');
        assert.strictEqual(views.length, 1);
    });

    it('refuses admission once closed', () => {
        const controller = new BackpressureController(backpressureSettings());
        controller.close();
        assert.throws(() => controller.admit({ requestId: 'r1', priority: 'interactive' }), failureKind('BackendUnavailable'));
    });

    it('requires the load window to match the configured error window', () => {
        assert.throws(() => new BackpressureController(backpressureSettings({ errorWindow: 4 }), new LoadSnapshot(5)), RangeError);
    });

    it('keeps in-flight work within capacity across a mixed admit and release sequence', async () => {
        const clock = new TestClock();
        const capacity = 4;
        const controller = new BackpressureController(
            backpressureSettings({ capacity, queueBound: 3, queueWaitMs: 60_000, errorWindow: 4, errorMinSamples: 2, errorThreshold: 0.5, cooldownMs: 1_000 }),
            new LoadSnapshot(4),
            clock.now
        );
        const held: Lease[] = [];
        let seed = 42;
        const random = () => {
            seed = (seed * 1_103_515_245 + 12_345) % 2_147_483_648;
            return seed / 2_147_483_648;
        };
        let sawDegraded = false;
        let closedTickets = 0;

        for (let step = 0; step < 300; step += 1) {
            clock.advance(100);
            if (held.length === 0 || random() < 0.55) {
                const before = controller.snapshot();
                const decision = controller.admit({ requestId: `r${step}`, priority: random() < 0.5 ? 'interactive' : 'batch' });
                if (decision.kind === 'admit') {
                    assert.ok(before.inFlight < before.effectiveCapacity, `admitted over effective capacity at step ${step}`);
                    held.push(decision.lease);
                } else if (decision.kind === 'queue') {
                    void decision.ticket.promoted.then(lease => { held.push(lease); }, () => {
                        closedTickets += 1;
                    });
                }
            } else {
                const index = Math.floor(random() * held.length);
                const [lease] = held.splice(index, 1);
                lease?.release(random() < 0.5 ? 'failure' : 'success');
            }
            await new Promise(resolve => setImmediate(resolve));

            const view = controller.snapshot();
            sawDegraded ||= view.degraded;
            assert.ok(view.inFlight <= capacity, `in-flight ${view.inFlight} at step ${step}`);
        }

        assert.strictEqual(sawDegraded, true);
        const queuedAtClose = controller.snapshot().queueDepth.total;
        controller.close();
        await new Promise(resolve => setImmediate(resolve));
        assert.strictEqual(closedTickets, queuedAtClose);
    });
});
