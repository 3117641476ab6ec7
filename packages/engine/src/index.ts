export * from "./atmosphere/kfactor";
export * from "./atmosphere/refractivity";
export * from "./atmosphere/standard";
export * from "./config";
export * from "./geo/constants";
export * from "./geo/coords";
export * from "./geo/earth";
export * from "./geo/ellipsoid";
export * from "./geo/fallback";
export * from "./geo/frames";
export * from "./geo/geodetic";
export * from "./geo/sphere";
export * from "./geo/vincenty";
export * from "./log";
export * from "./math/mat3";
export * from "./math/vector";
export * from "./radar/engine";
export * from "./radar/triangle";
