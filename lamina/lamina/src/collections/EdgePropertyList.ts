import invariant from "tiny-invariant";
import type { EdgeListFieldDescriptor } from "../schema";
import type { Draftable } from "../properties";
import type { TreeObject } from "../TreeObject";
import type { EdgeType } from "./edges";
import { draftType, readFieldSymbol, updateFieldSymbol, writeFieldSymbol } from "../runtime-symbols";
import { isArrayOf } from "../utils";

/**
 * Ordered entries of one field. Every mutation rewrites the whole field, so for a
 * stored object it is a single update queued behind the object's earlier writes.
 */
export class EdgePropertyList<E> implements Draftable<readonly E[]> {
  declare readonly [draftType]: readonly E[];

  constructor(
    private readonly owner: TreeObject,
    private readonly field: EdgeListFieldDescriptor,
    private readonly edge: EdgeType<E>,
  ) {}

  async toArray(): Promise<E[]> {
    return this.entries(await this.owner[readFieldSymbol](this.field));
  }

  async length(): Promise<number> {
    return (await this.toArray()).length;
  }

  async at(index: number): Promise<E | undefined> {
    return (await this.toArray()).at(index);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<E> {
    yield* await this.toArray();
  }

  async replace(entries: readonly E[]): Promise<void> {
    await this.owner[writeFieldSymbol](this.field, [...entries]);
  }

  async append(...entries: E[]): Promise<void> {
    await this.mutate((current) => [...current, ...entries]);
  }

  async insert(index: number, entry: E): Promise<void> {
    await this.mutate((current) => {
      checkIndex(index, current.length + 1);
      return [...current.slice(0, index), entry, ...current.slice(index)];
    });
  }

  async remove(index: number): Promise<void> {
    await this.mutate((current) => {
      checkIndex(index, current.length);
      return current.filter((_, position) => position !== index);
    });
  }

  async move(from: number, to: number): Promise<void> {
    await this.mutate((current) => {
      checkIndex(from, current.length);
      checkIndex(to, current.length);
      const next = [...current];
      const [entry] = next.splice(from, 1);
      invariant(entry !== undefined);
      next.splice(to, 0, entry);
      return next;
    });
  }

  async clear(): Promise<void> {
    await this.replace([]);
  }

  private async mutate(update: (current: E[]) => E[]): Promise<void> {
    await this.owner[updateFieldSymbol](this.field, (current) => update(this.entries(current)));
  }

  private entries(value: unknown): E[] {
    invariant(
      isArrayOf(value, (item) => this.edge.is(item)),
      `field "${this.field.name}" does not hold ${this.edge.name} entries`,
    );
    return [...value];
  }
}

function checkIndex(index: number, length: number) {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new RangeError(`index ${index} is out of range for ${length} entries`);
  }
}
