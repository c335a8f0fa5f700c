import { errorMessage } from "./errors.js";
import type { Chunk, ChunkProgress, PartialSummary } from "./types.js";

export type SummarizeFn = (chunk: Chunk, signal?: AbortSignal) => Promise<PartialSummary>;

export type FanOutOptions = {
  concurrency: number;
  signal?: AbortSignal;
  onChunkDone?: (progress: ChunkProgress) => void;
};

/**
 * Summarizes every chunk through a bounded worker pool. Results land in the slot of
 * their chunk's position, so output order never depends on completion order.
 * Never rejects: a chunk that throws, or is never dispatched because the run was
 * cancelled, comes back as a failed entry.
 */
export async function runAll(
  chunks: readonly Chunk[],
  summarize: SummarizeFn,
  options: FanOutOptions,
): Promise<PartialSummary[]> {
  const total = chunks.length;
  const slots: Array<PartialSummary | undefined> = new Array(total);
  const workerCount = Math.min(total, Math.max(1, Math.floor(options.concurrency) || 1));
  let nextSlot = 0;
  let completed = 0;

  const settle = (position: number, result: PartialSummary): void => {
    slots[position] = result;
    completed++;
    options.onChunkDone?.({
      chunkIndex: result.chunkIndex,
      succeeded: !result.failed,
      completed,
      total,
      ...(result.failed ? { errorDetail: result.errorDetail } : {}),
    });
  };

  const worker = async (): Promise<void> => {
    while (nextSlot < total && !options.signal?.aborted) {
      const position = nextSlot++;
      const chunk = chunks[position];
      let result: PartialSummary;
      try {
        result = await summarize(chunk, options.signal);
      } catch (err) {
        result = {
          chunkIndex: chunk.index,
          text: "",
          failed: true,
          errorDetail: `ServiceError: ${errorMessage(err)}`,
          attempts: 0,
          fromCache: false,
        };
      }
      settle(position, result);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return chunks.map(
    (chunk, position) =>
      slots[position] ?? {
        chunkIndex: chunk.index,
        text: "",
        failed: true,
        errorDetail: "Cancelled: chunk was not dispatched",
        attempts: 0,
        fromCache: false,
      },
  );
}
