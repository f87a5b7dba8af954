export * from "./logger";
export * from "./errors";
export * from "./node_store";
export * from "./in_memory_node_store";
export * from "./message";
export * from "./codec";
export * from "./dial";
export * from "./protocol";
export * from "./retry";
export * from "./connector";
export * from "./engine";
export * from "./node";
