export const SERVER_GLOBALS = {
  objects: "objects",
  properties: "properties",
  objectKind: "__kind__",
  objectParent: "__parent__",
  objectSequence: "__seq__",
  objectDerived: "__derived__",
  metadataMap: "__metadata__",
  metadataMapFields: {
    rootId: "rootId",
    sequence: "sequence",
  },
} as const;
