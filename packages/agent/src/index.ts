export * from "./address-matcher";
export * from "./prompt/address-match-prompt";
