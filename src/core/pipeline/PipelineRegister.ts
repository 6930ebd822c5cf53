import { BUBBLE_SLOT, EMPTY_SLOT, type PipelineSlot } from "./PipelineTypes";

/**
 * Edge-triggered latch between two stages. Stages write the next value during
 * a cycle; {@link advance} makes it current at the clock edge. A latch that is
 * not written this cycle drains to empty.
 */
export class PipelineRegister<T> {
  private current: PipelineSlot<T> = EMPTY_SLOT;
  private next: PipelineSlot<T> = EMPTY_SLOT;

  getCurrent(): PipelineSlot<T> {
    return this.current;
  }

  setNext(value: PipelineSlot<T>): void {
    this.next = value;
  }

  /** Keeps the current contents across the next edge. */
  hold(): void {
    this.next = this.current;
  }

  bubble(): void {
    this.next = BUBBLE_SLOT;
  }

  advance(): void {
    this.current = this.next;
    this.next = EMPTY_SLOT;
  }

  clear(): void {
    this.current = EMPTY_SLOT;
    this.next = EMPTY_SLOT;
  }

  isEmpty(): boolean {
    return this.current.state === "empty";
  }

  isBubble(): boolean {
    return this.current.state === "bubble";
  }

  /** True when the latch carries an instruction. */
  isOccupied(): boolean {
    return this.current.state === "valid";
  }
}
