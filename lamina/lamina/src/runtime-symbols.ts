// Internal protocol between TreeObject and its field handles, collections and the copy engine.
export const draftType: unique symbol = Symbol("draftType");
export const readFieldSymbol: unique symbol = Symbol("readField");
export const readDerivedSymbol: unique symbol = Symbol("readDerived");
export const writeFieldSymbol: unique symbol = Symbol("writeField");
export const updateFieldSymbol: unique symbol = Symbol("updateField");
export const listChildrenSymbol: unique symbol = Symbol("listChildren");
export const snapshotSymbol: unique symbol = Symbol("snapshot");
export const storeSymbol: unique symbol = Symbol("store");
export const instantiateSymbol: unique symbol = Symbol("instantiate");
export const deleteSymbol: unique symbol = Symbol("delete");
