import { MemoryStore } from "./memoryStore";
import { MongoStore } from "./mongoStore";
import { AssistantStore, StoreDriver } from "./types";

export const createStore = (driver: StoreDriver): AssistantStore =>
  driver === "memory" ? new MemoryStore() : new MongoStore();

export { MemoryStore, MongoStore };
export type { AssistantStore, StoreDriver };
