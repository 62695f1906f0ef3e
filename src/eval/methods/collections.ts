import { sameValueZero } from "../../runtime/equality";
import type { MapValue, SetValue, Value } from "../../runtime/value";
import { arr, bool, undef } from "../../runtime/value";
import type { MethodTable } from "./shared";
import { arg, callbackArg, optionalArg } from "./shared";

function mapIndex(map: MapValue, key: Value): number {
  return map.entries.findIndex(([k]) => sameValueZero(k, key));
}

function setIndex(set: SetValue, value: Value): number {
  return set.values.findIndex((v) => sameValueZero(v, value));
}

export const MAP_METHODS: MethodTable<MapValue> = {
  get: (_ctx, self, args) => {
    const idx = mapIndex(self, arg(args, 0));
    return idx < 0 ? undef() : self.entries[idx][1];
  },
  set: (_ctx, self, args) => {
    const key = arg(args, 0);
    const value = arg(args, 1);
    const idx = mapIndex(self, key);
    if (idx < 0) self.entries.push([key, value]);
    else self.entries[idx][1] = value;
    return self;
  },
  has: (_ctx, self, args) => bool(mapIndex(self, arg(args, 0)) >= 0),
  delete: (_ctx, self, args) => {
    const idx = mapIndex(self, arg(args, 0));
    if (idx >= 0) self.entries.splice(idx, 1);
    return bool(idx >= 0);
  },
  clear: (_ctx, self) => {
    self.entries.length = 0;
    return undef();
  },
  forEach: (ctx, self, args) => {
    const fn = callbackArg(args, 0, "Map.prototype.forEach");
    for (const [k, v] of [...self.entries]) ctx.callValue(fn, [v, k, self], optionalArg(args, 1));
    return undef();
  },
  keys: (_ctx, self) => arr(self.entries.map(([k]) => k)),
  values: (_ctx, self) => arr(self.entries.map(([, v]) => v)),
  entries: (_ctx, self) => arr(self.entries.map(([k, v]) => arr([k, v]))),
};

export const SET_METHODS: MethodTable<SetValue> = {
  add: (_ctx, self, args) => {
    const value = arg(args, 0);
    if (setIndex(self, value) < 0) self.values.push(value);
    return self;
  },
  has: (_ctx, self, args) => bool(setIndex(self, arg(args, 0)) >= 0),
  delete: (_ctx, self, args) => {
    const idx = setIndex(self, arg(args, 0));
    if (idx >= 0) self.values.splice(idx, 1);
    return bool(idx >= 0);
  },
  clear: (_ctx, self) => {
    self.values.length = 0;
    return undef();
  },
  forEach: (ctx, self, args) => {
    const fn = callbackArg(args, 0, "Set.prototype.forEach");
    for (const v of [...self.values]) ctx.callValue(fn, [v, v, self], optionalArg(args, 1));
    return undef();
  },
  values: (_ctx, self) => arr([...self.values]),
  keys: (_ctx, self) => arr([...self.values]),
  entries: (_ctx, self) => arr(self.values.map((v) => arr([v, v]))),
};
