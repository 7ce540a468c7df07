import { describe, test, expect } from 'vitest';
import { PendingUpdateMailbox } from './mailbox';
import { InboundQueue } from './inbound-queue';

describe('PendingUpdateMailbox', () => {
  test('keeps only the latest value per kind and id', () => {
    const mailbox = new PendingUpdateMailbox<'pos' | 'hp', number>();
    mailbox.post('pos', 1, 10);
    mailbox.post('pos', 1, 11);
    mailbox.post('pos', 2, 20);
    mailbox.post('hp', 1, 99);

    expect(mailbox.size).toBe(3);
    const drained = mailbox.drain();
    expect(Array.from(drained.get('pos') ?? [])).toEqual([[1, 11], [2, 20]]);
    expect(Array.from(drained.get('hp') ?? [])).toEqual([[1, 99]]);
  });

  test('drain empties the mailbox', () => {
    const mailbox = new PendingUpdateMailbox<'pos', number>();
    mailbox.post('pos', 1, 1);
    mailbox.drain();
    expect(mailbox.isEmpty).toBe(true);
    expect(mailbox.drain().size).toBe(0);
  });

  test('posts after a drain do not leak into the drained map', () => {
    const mailbox = new PendingUpdateMailbox<'pos', number>();
    mailbox.post('pos', 1, 1);
    const drained = mailbox.drain();
    mailbox.post('pos', 1, 2);
    expect(drained.get('pos')?.get(1)).toBe(1);
    expect(mailbox.drain().get('pos')?.get(1)).toBe(2);
  });
});

describe('InboundQueue', () => {
  test('drains in arrival order', () => {
    const queue = new InboundQueue<string>();
    queue.push('a');
    queue.push('b');
    expect(queue.length).toBe(2);
    expect(queue.drain()).toEqual(['a', 'b']);
    expect(queue.drain()).toEqual([]);
  });
});
