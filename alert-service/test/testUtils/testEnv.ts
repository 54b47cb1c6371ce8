import crypto from "node:crypto";

type DocData = Record<string, unknown>;
type Store = Map<string, Map<string, DocData>>;
type Filter = { field: string; op: "==" | "in"; value: unknown };

function cloneStore(store: Store): Store {
  const clone: Store = new Map();
  for (const [collection, docs] of store.entries()) {
    const docClone: Map<string, DocData> = new Map();
    for (const [id, data] of docs.entries()) {
      docClone.set(id, structuredClone(data));
    }
    clone.set(collection, docClone);
  }
  return clone;
}

function ensureCollection(store: Store, name: string) {
  let collection = store.get(name);
  if (!collection) {
    collection = new Map();
    store.set(name, collection);
  }
  return collection;
}

function matches(data: DocData, filter: Filter): boolean {
  const actual = data[filter.field];
  if (filter.op === "in") {
    return Array.isArray(filter.value) && filter.value.includes(actual);
  }
  return actual === filter.value;
}

class MockDocumentSnapshot {
  constructor(
    readonly ref: MockDocumentReference,
    private readonly dataObj: DocData | undefined
  ) {}

  data() {
    return this.dataObj ? structuredClone(this.dataObj) : undefined;
  }

  get(field: string) {
    return this.dataObj ? this.dataObj[field] : undefined;
  }

  get id() {
    return this.ref.id;
  }

  get exists() {
    return this.dataObj !== undefined;
  }
}

class MockQuerySnapshot {
  constructor(readonly docs: MockDocumentSnapshot[]) {}

  get empty() {
    return this.docs.length === 0;
  }

  get size() {
    return this.docs.length;
  }
}

class MockDocumentReference {
  constructor(
    private readonly store: Store,
    readonly collection: string,
    readonly id: string
  ) {}

  get path() {
    return `${this.collection}/${this.id}`;
  }

  read() {
    const data = this.store.get(this.collection)?.get(this.id);
    return new MockDocumentSnapshot(this, data ? structuredClone(data) : undefined);
  }

  write(data: DocData, mode: "set" | "create" | "update" | "merge") {
    const collection = ensureCollection(this.store, this.collection);
    const existing = collection.get(this.id);
    if (mode === "create" && existing) {
      throw Object.assign(new Error(`Document already exists: ${this.path}`), { code: 6 });
    }
    if (mode === "update" && !existing) {
      throw Object.assign(new Error(`No document to update: ${this.path}`), { code: 5 });
    }
    const next = (mode === "update" || mode === "merge") && existing
      ? { ...structuredClone(existing), ...structuredClone(data) }
      : structuredClone(data);
    collection.set(this.id, next);
  }

  async get() {
    return this.read();
  }

  async set(data: DocData, options?: { merge?: boolean }) {
    this.write(data, options?.merge ? "merge" : "set");
  }

  async create(data: DocData) {
    this.write(data, "create");
  }

  async update(data: DocData) {
    this.write(data, "update");
  }

  withStore(store: Store) {
    return new MockDocumentReference(store, this.collection, this.id);
  }
}

class MockQuery {
  constructor(
    protected readonly store: Store,
    protected readonly collection: string,
    protected readonly filters: Filter[] = []
  ) {}

  where(field: string, op: "==" | "in", value: unknown) {
    return new MockQuery(this.store, this.collection, [...this.filters, { field, op, value }]);
  }

  read() {
    const collection = ensureCollection(this.store, this.collection);
    const docs: MockDocumentSnapshot[] = [];
    for (const [id, data] of collection.entries()) {
      if (this.filters.every((filter) => matches(data, filter))) {
        docs.push(new MockDocumentSnapshot(new MockDocumentReference(this.store, this.collection, id), structuredClone(data)));
      }
    }
    return new MockQuerySnapshot(docs);
  }

  async get() {
    return this.read();
  }

  withStore(store: Store) {
    return new MockQuery(store, this.collection, [...this.filters]);
  }
}

class MockCollectionReference extends MockQuery {
  constructor(store: Store, collection: string) {
    super(store, collection);
  }

  doc(id?: string) {
    const docId = id || crypto.randomUUID();
    return new MockDocumentReference(this.store, this.collection, docId);
  }

  async add(data: DocData) {
    const ref = this.doc();
    await ref.set(data);
    return ref;
  }
}

class MockTransaction {
  constructor(private readonly store: Store) {}

  async get(target: MockDocumentReference | MockQuery) {
    return target.withStore(this.store).read();
  }

  async getAll(...refs: MockDocumentReference[]) {
    if (!refs.length) throw new Error("getAll() requires at least one document reference");
    return refs.map((ref) => ref.withStore(this.store).read());
  }

  set(ref: MockDocumentReference, data: DocData, options?: { merge?: boolean }) {
    ref.withStore(this.store).write(data, options?.merge ? "merge" : "set");
    return this;
  }

  create(ref: MockDocumentReference, data: DocData) {
    ref.withStore(this.store).write(data, "create");
    return this;
  }

  update(ref: MockDocumentReference, data: DocData) {
    ref.withStore(this.store).write(data, "update");
    return this;
  }
}

export class MockFirestore {
  private store: Store = new Map();
  transactions = 0;

  collection(name: string) {
    return new MockCollectionReference(this.store, name);
  }

  async getAll(...refs: MockDocumentReference[]) {
    if (!refs.length) throw new Error("getAll() requires at least one document reference");
    return refs.map((ref) => ref.withStore(this.store).read());
  }

  async runTransaction<T>(fn: (tx: MockTransaction) => T | Promise<T>) {
    this.transactions += 1;
    const workingStore = cloneStore(this.store);
    const tx = new MockTransaction(workingStore);
    const result = await fn(tx);
    this.store = workingStore;
    return result;
  }

  reset() {
    this.store = new Map();
    this.transactions = 0;
  }

  dump() {
    return cloneStore(this.store);
  }
}

export const mockFirestore = new MockFirestore();

export function resetTestEnv() {
  mockFirestore.reset();
}

export async function seedDoc(collection: string, id: string | number, data: DocData) {
  await mockFirestore.collection(collection).doc(String(id)).set(data);
}

export function getDocData(collection: string, id: string | number) {
  const store = mockFirestore.dump();
  return store.get(collection)?.get(String(id));
}

export function listDocs(collection: string) {
  const store = mockFirestore.dump();
  return [...(store.get(collection)?.values() ?? [])];
}

/** Offsets a point northwards by roughly `meters` along its meridian. */
export function northOf(point: { lat: number; lon: number }, meters: number) {
  return { lat: point.lat + meters / 111_320, lon: point.lon };
}
