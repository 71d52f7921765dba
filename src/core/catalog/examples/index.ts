/**
 * Demo runners for every catalogued pattern, keyed by pattern id
 */

import type { PatternId } from "../../../types/index.js";
import { demo as singleton } from "./creational/singleton.js";
import { demo as factoryMethod } from "./creational/factory-method.js";
import { demo as abstractFactory } from "./creational/abstract-factory.js";
import { demo as builder } from "./creational/builder.js";
import { demo as prototype } from "./creational/prototype.js";
import { demo as adapter } from "./structural/adapter.js";
import { demo as bridge } from "./structural/bridge.js";
import { demo as composite } from "./structural/composite.js";
import { demo as decorator } from "./structural/decorator.js";
import { demo as facade } from "./structural/facade.js";
import { demo as flyweight } from "./structural/flyweight.js";
import { demo as proxy } from "./structural/proxy.js";

export type Demo = (print: (line: string) => void) => void;

export const DEMOS: Readonly<Record<PatternId, Demo>> = {
  singleton,
  "factory-method": factoryMethod,
  "abstract-factory": abstractFactory,
  builder,
  prototype,
  adapter,
  bridge,
  composite,
  decorator,
  facade,
  flyweight,
  proxy,
};
