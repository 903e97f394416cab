export * from "./announcer.js";
