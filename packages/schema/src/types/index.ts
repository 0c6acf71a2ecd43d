export * from "./tile";
export * from "./meld";
export * from "./state";
export * from "./violation";
