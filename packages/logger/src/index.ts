// Main exports for the logging package

import pino from "pino";

export { createNodeLogger, withProjectContext, withRequestContext } from "./node";
export * from "./redaction";
export * from "./types";
export { pino };
