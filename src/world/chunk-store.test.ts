import { describe, test, expect, beforeEach } from 'vitest';
import { ChunkStore, ChunkRequest } from './chunk-store';
import { AIR } from './constants';
import { chunkCoord } from './coords';
import { MalformedMessageError } from '../errors';

/** blocks[i] = i, so every cell's value names its payload index. */
const indexed = (): number[] => Array.from({ length: 256 }, (_, i) => i);
const zeros = (): number[] => new Array<number>(256).fill(0);

const describeRequests = (requests: ChunkRequest[]) => requests.map((r) => `${r.type}(${r.cx},${r.cy})`);

describe('ChunkStore', () => {
  let store: ChunkStore;

  beforeEach(() => {
    store = new ChunkStore();
  });

  describe('ingestChunkData', () => {
    test('stores the payload index-reversed', () => {
      store.ingestChunkData(0, 0, indexed());
      for (let y = 0; y < 16; y++) {
        for (let x = 0; x < 16; x++) {
          expect(store.getCell(0, 0, x, y)).toBe(255 - (y * 16 + x));
        }
      }
    });

    test('spot checks of the reversal', () => {
      store.ingestChunkData(2, 3, indexed());
      expect(store.getCell(2, 3, 0, 0)).toBe(255);
      expect(store.getCell(2, 3, 3, 2)).toBe(220);
      expect(store.getCell(2, 3, 15, 15)).toBe(0);
    });

    test('replaces an existing chunk wholesale', () => {
      store.ingestChunkData(0, 0, indexed());
      store.ingestChunkData(0, 0, zeros());
      expect(store.getCell(0, 0, 0, 0)).toBe(AIR);
      expect(store.size).toBe(1);
    });

    test('rejects a payload that is not 256 blocks', () => {
      expect(() => store.ingestChunkData(0, 0, [1, 2, 3])).toThrow(MalformedMessageError);
      expect(store.has(0, 0)).toBe(false);
    });
  });

  describe('getBlock', () => {
    test('reads world positions through the same reversal as block changes', () => {
      store.ingestChunkData(0, 0, indexed());
      // cell (15 - 3, 15 - 2) holds blocks[255 - 220]
      expect(store.getBlock(3, 2)).toBe(35);
      expect(store.getBlock(0, 0)).toBe(0);
      expect(store.getBlock(15, 15)).toBe(255);
    });

    test('floors fractional positions', () => {
      store.ingestChunkData(0, 0, indexed());
      expect(store.getBlock(3.7, 2.2)).toBe(35);
    });

    test('returns air for absent chunks and negative positions', () => {
      store.ingestChunkData(0, 0, indexed());
      expect(store.getBlock(16, 0)).toBe(AIR);
      expect(store.getBlock(1000, 1000)).toBe(AIR);
      expect(store.getBlock(-1, 5)).toBe(AIR);
      expect(store.getBlock(5, -0.5)).toBe(AIR);
    });
  });

  describe('block ids', () => {
    test('ids beyond a byte are stored as given', () => {
      store.ingestChunkData(0, 0, zeros());
      store.applyBlockChange(1, 1, 256);
      store.applyBlockChange(2, 2, 300);
      store.applyBlockChange(3, 3, -1);

      expect(store.getBlock(1, 1)).toBe(256);
      expect(store.getBlock(2, 2)).toBe(300);
      expect(store.getBlock(3, 3)).toBe(-1);
    });

    test('ingest keeps wide ids', () => {
      const blocks = zeros();
      blocks[35] = 1000;
      store.ingestChunkData(0, 0, blocks);
      expect(store.getBlock(3, 2)).toBe(1000);
    });

    test('non-integer ids are rejected', () => {
      store.ingestChunkData(0, 0, zeros());
      expect(() => store.applyBlockChange(1, 1, 1.5)).toThrow(RangeError);
      expect(() => store.applyBatchBlockChange([{ x: 1, y: 1 }], Number.NaN)).toThrow(RangeError);
      expect(store.getBlock(1, 1)).toBe(AIR);

      const blocks = zeros();
      blocks[0] = 0.5;
      expect(() => store.ingestChunkData(1, 0, blocks)).toThrow(RangeError);
      expect(store.has(1, 0)).toBe(false);
    });
  });

  describe('block changes', () => {
    test('a change for an absent chunk is a silent no-op', () => {
      expect(store.applyBlockChange(19, 2, 3)).toBe(false);
      expect(store.has(1, 0)).toBe(false);
      expect(store.size).toBe(0);
    });

    test('a change lands in the reversed cell of the owning chunk', () => {
      store.ingestChunkData(1, 0, zeros());
      expect(store.applyBlockChange(19, 2, 3)).toBe(true);
      expect(store.getCell(1, 0, 12, 13)).toBe(3);
      expect(store.getBlock(19, 2)).toBe(3);
    });

    test('negative positions are ignored', () => {
      store.ingestChunkData(0, 0, zeros());
      expect(store.applyBlockChange(-1, 0, 4)).toBe(false);
    });

    test('a batch applies only to loaded chunks', () => {
      store.ingestChunkData(0, 0, zeros());
      const applied = store.applyBatchBlockChange([{ x: 1, y: 1 }, { x: 40, y: 40 }, { x: 2, y: 1 }], 5);
      expect(applied).toBe(2);
      expect(store.getBlock(1, 1)).toBe(5);
      expect(store.getBlock(2, 1)).toBe(5);
      expect(store.getBlock(40, 40)).toBe(AIR);
    });

    test('a change to a placeholder is kept until the data arrives', () => {
      store.reconcileViewport(chunkCoord(0, 0), 0, 0);
      expect(store.applyBlockChange(4, 4, 2)).toBe(true);
      expect(store.getBlock(4, 4)).toBe(2);
      store.ingestChunkData(0, 0, zeros());
      expect(store.getBlock(4, 4)).toBe(AIR);
    });
  });

  describe('reconcileViewport', () => {
    test('requests every absent chunk in the window', () => {
      const requests = store.reconcileViewport(chunkCoord(1, 1), 1, 1);
      expect(describeRequests(requests)).toEqual([
        'request_chunk(0,0)', 'request_chunk(0,1)', 'request_chunk(0,2)',
        'request_chunk(1,0)', 'request_chunk(1,1)', 'request_chunk(1,2)',
        'request_chunk(2,0)', 'request_chunk(2,1)', 'request_chunk(2,2)'
      ]);
      expect(store.size).toBe(9);
      expect(store.isPlaceholder(1, 1)).toBe(true);
    });

    test('is idempotent for an unchanged center and store', () => {
      store.reconcileViewport(chunkCoord(3, 3), 2, 2);
      expect(store.reconcileViewport(chunkCoord(3, 3), 2, 2)).toEqual([]);
    });

    test('evicts chunks outside the window with exactly one unload each', () => {
      store.ingestChunkData(0, 0, indexed());
      store.ingestChunkData(5, 5, indexed());

      const requests = store.reconcileViewport(chunkCoord(0, 0), 2, 2);
      const unloads = requests.filter((r) => r.type === 'unload_chunk');

      expect(describeRequests(unloads)).toEqual(['unload_chunk(5,5)']);
      expect(requests[0].type).toBe('unload_chunk');
      expect(store.has(5, 5)).toBe(false);
      expect(store.has(0, 0)).toBe(true);
      expect(store.isPlaceholder(0, 0)).toBe(false);
      expect(store.getCell(0, 0, 0, 0)).toBe(255);
    });

    test('evicts a chunk outside on one axis only', () => {
      store.ingestChunkData(0, 4, zeros());
      const requests = store.reconcileViewport(chunkCoord(0, 0), 2, 2);
      expect(describeRequests(requests.filter((r) => r.type === 'unload_chunk'))).toEqual(['unload_chunk(0,4)']);
    });

    test('never emits a negative coordinate', () => {
      for (let radius = 0; radius <= 4; radius++) {
        const fresh = new ChunkStore();
        for (const request of fresh.reconcileViewport(chunkCoord(0, 0), radius, radius)) {
          expect(request.cx).toBeGreaterThanOrEqual(0);
          expect(request.cy).toBeGreaterThanOrEqual(0);
        }
        expect(fresh.size).toBe((radius + 1) * (radius + 1));
      }
    });

    test('a window entirely in negative space requests nothing', () => {
      expect(store.reconcileViewport(chunkCoord(-5, -5), 2, 2)).toEqual([]);
      expect(store.size).toBe(0);
    });

    test('moving the center unloads behind and requests ahead', () => {
      store.reconcileViewport(chunkCoord(0, 0), 1, 0);
      const requests = store.reconcileViewport(chunkCoord(2, 0), 1, 0);
      expect(describeRequests(requests)).toEqual([
        'unload_chunk(0,0)',
        'request_chunk(2,0)',
        'request_chunk(3,0)'
      ]);
    });
  });

  test('forEachBlock reports world positions that match getBlock', () => {
    const blocks = zeros();
    blocks[35] = 9;
    store.ingestChunkData(1, 0, blocks);

    const seen: Array<[number, number, number]> = [];
    store.forEachBlock((x, y, id) => seen.push([x, y, id]));

    expect(seen).toEqual([[19, 2, 9]]);
    expect(store.getBlock(19, 2)).toBe(9);
  });

  test('loadedCoords and clear', () => {
    store.ingestChunkData(1, 2, zeros());
    store.ingestChunkData(3, 4, zeros());
    expect(store.loadedCoords()).toEqual([{ cx: 1, cy: 2 }, { cx: 3, cy: 4 }]);
    store.clear();
    expect(store.size).toBe(0);
  });
});
