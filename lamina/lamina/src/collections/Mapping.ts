import type { ChildrenFieldDescriptor, KindConstructor } from "../schema";
import type { InitOf } from "../properties";
import type { TreeObject } from "../TreeObject";
import { DraftSeed } from "../seeds";
import { listChildrenSymbol, storeSymbol } from "../runtime-symbols";
import { RemoteError } from "../errors";

/**
 * The children of one collection of an object, keyed by id and listed in server order.
 * Every read goes to the server; nothing is cached here.
 */
export class Mapping<T extends TreeObject> {
  constructor(
    private readonly owner: TreeObject,
    private readonly field: ChildrenFieldDescriptor,
    private readonly target: () => KindConstructor<T>,
  ) {}

  async values(): Promise<T[]> {
    const kind = this.target();
    const children = await this.owner[listChildrenSymbol](this.field);
    return children.map((child) => {
      if (!(child instanceof kind)) {
        throw new RemoteError(`collection "${this.field.name}" listed a ${child.kind.name}`, "UNKNOWN");
      }
      return child;
    });
  }

  async keys(): Promise<string[]> {
    return (await this.values()).map((child) => child.id);
  }

  async entries(): Promise<[string, T][]> {
    return (await this.values()).map((child) => [child.id, child]);
  }

  async size(): Promise<number> {
    return (await this.values()).length;
  }

  async get(id: string): Promise<T | undefined> {
    return (await this.values()).find((child) => child.id === id);
  }

  async has(id: string): Promise<boolean> {
    return (await this.get(id)) !== undefined;
  }

  async findByName(name: string): Promise<T | undefined> {
    for (const child of await this.values()) {
      if ((await child.name.get()) === name) {
        return child;
      }
    }
    return undefined;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    yield* await this.values();
  }

  /** Constructs a child from `init` and stores it under the owner. */
  async create(init: InitOf<T>): Promise<T> {
    const child = new (this.target())(new DraftSeed(new Map(Object.entries(init))));
    await child[storeSymbol](this.owner);
    return child;
  }
}
