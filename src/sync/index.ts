/**
 * Sync Module
 *
 * Handoff from the network receiver to the tick: a last-writer-wins mailbox
 * for positions, a FIFO queue for everything else, and the reconciler that
 * drains both once per tick.
 */

export { PendingUpdateMailbox } from './mailbox';
export { InboundQueue } from './inbound-queue';
export { RemotePlayers } from './remote-players';
export type { RemotePlayerSnapshot } from './remote-players';
export { Reconciler } from './reconciler';
export type {
    ReconcilerOptions,
    ReconcileReport,
    QueuedEvent,
    QueuedEventType,
    QueuedArrival,
    PositionUpdate,
    MailboxKind,
    PositionMailbox
} from './reconciler';
