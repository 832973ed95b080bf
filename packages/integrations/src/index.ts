export * from "./appfolio/client";
export * from "./google/calendar";
export * from "./search/client";
