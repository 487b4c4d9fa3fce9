export * from "./io.module";
export * from "./logger.decorator";
export * from "./logger.service";
