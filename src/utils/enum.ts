// utility to define enums that carry extra data per entry, without the
// boilerplate of a TS enum plus a side table.

// export const kShape = defineEnum({
//    circle: { value: 1, title: "Circle" },
//    square: { value: 2, title: "Square" },
// } as const);
//
// kShape.keys;                   // ("circle" | "square")[]
// kShape.infoByKey.circle.title; // "Circle"
// kShape.infoByValue.get(2)      // { key: "square", value: 2, title: "Square" }
// type ShapeKey = typeof kShape.$key;

type EnumValue = string | number;

// requires at least a "value" field, can have any other fields.
type EnumDef = Record<string, { value: EnumValue }>;

type EnumKeyUnion<D extends EnumDef> = keyof D & string;
type EnumValueUnion<D extends EnumDef> = D[EnumKeyUnion<D>]["value"];

type EnumInfo<D extends EnumDef, K extends EnumKeyUnion<D>> = { key: K } & D[K];
type EnumInfoUnion<D extends EnumDef> = {
  [K in EnumKeyUnion<D>]: EnumInfo<D, K>;
}[EnumKeyUnion<D>];

export function defineEnum<const D extends EnumDef>(def: D) {
  const keys = Object.keys(def) as EnumKeyUnion<D>[];

  // key.circle -> "circle"
  const key = Object.fromEntries(keys.map((k) => [k, k])) as {
    [K in EnumKeyUnion<D>]: K;
  };

  const infoByKey = Object.fromEntries(keys.map((k) => [k, { key: k, ...def[k] }])) as {
    [K in EnumKeyUnion<D>]: EnumInfo<D, K>;
  };

  const infos = keys.map((k) => infoByKey[k]) as EnumInfoUnion<D>[];
  const values = keys.map((k) => def[k].value) as EnumValueUnion<D>[];

  const infoByValue = new Map<EnumValueUnion<D>, EnumInfoUnion<D>>();
  infos.forEach((info, i) => infoByValue.set(values[i], info));

  // phantom field for type extraction
  const $key = null as unknown as EnumKeyUnion<D>;

  function isValidKey(k: unknown): k is EnumKeyUnion<D> {
    return typeof k === "string" && Object.prototype.hasOwnProperty.call(def, k);
  }

  function coerceByKey(k: unknown): EnumInfoUnion<D> | undefined {
    return isValidKey(k) ? infoByKey[k] : undefined;
  }

  return {
    $key,

    key,
    infoByKey,
    infoByValue,

    keys,
    values,
    infos,

    isValidKey,
    coerceByKey,
  } as const;
}
