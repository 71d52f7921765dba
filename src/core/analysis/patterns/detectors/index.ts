/**
 * Pattern Detectors Module
 *
 * Exports all design pattern detectors.
 *
 * @module
 */

// Base
export {
  BasePatternDetector,
  DETECTOR_FLOOR,
  DEFAULT_MIN_CONFIDENCE,
  type FieldInfo,
} from "./base-detector.js";

// Creational
export { SingletonDetector, createSingletonDetector } from "./singleton-detector.js";
export { FactoryMethodDetector, createFactoryMethodDetector } from "./factory-method-detector.js";
export { AbstractFactoryDetector, createAbstractFactoryDetector } from "./abstract-factory-detector.js";
export { BuilderDetector, createBuilderDetector } from "./builder-detector.js";
export { PrototypeDetector, createPrototypeDetector } from "./prototype-detector.js";

// Structural
export { AdapterDetector, createAdapterDetector } from "./adapter-detector.js";
export { BridgeDetector, createBridgeDetector } from "./bridge-detector.js";
export { CompositeDetector, createCompositeDetector } from "./composite-detector.js";
export { DecoratorDetector, createDecoratorDetector } from "./decorator-detector.js";
export { FacadeDetector, createFacadeDetector } from "./facade-detector.js";
export { FlyweightDetector, createFlyweightDetector } from "./flyweight-detector.js";
export { ProxyDetector, createProxyDetector } from "./proxy-detector.js";

// Convenience function to get all default detectors
import { createSingletonDetector } from "./singleton-detector.js";
import { createFactoryMethodDetector } from "./factory-method-detector.js";
import { createAbstractFactoryDetector } from "./abstract-factory-detector.js";
import { createBuilderDetector } from "./builder-detector.js";
import { createPrototypeDetector } from "./prototype-detector.js";
import { createAdapterDetector } from "./adapter-detector.js";
import { createBridgeDetector } from "./bridge-detector.js";
import { createCompositeDetector } from "./composite-detector.js";
import { createDecoratorDetector } from "./decorator-detector.js";
import { createFacadeDetector } from "./facade-detector.js";
import { createFlyweightDetector } from "./flyweight-detector.js";
import { createProxyDetector } from "./proxy-detector.js";
import type { IPatternDetector } from "../interfaces.js";

/**
 * Create all default pattern detectors, in catalogue order.
 */
export function createAllDetectors(): IPatternDetector[] {
  return [
    createSingletonDetector(),
    createFactoryMethodDetector(),
    createAbstractFactoryDetector(),
    createBuilderDetector(),
    createPrototypeDetector(),
    createAdapterDetector(),
    createBridgeDetector(),
    createCompositeDetector(),
    createDecoratorDetector(),
    createFacadeDetector(),
    createFlyweightDetector(),
    createProxyDetector(),
  ];
}
