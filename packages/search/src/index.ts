export type { ISearchProvider } from "./search-provider.interface.js";
export { TavilySearchProvider } from "./tavily-provider.js";
export type { TavilyProviderConfig } from "./tavily-provider.js";
