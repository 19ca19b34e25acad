export { createLocaleResolver, type LocaleResolver } from "./resolve.js";
export { LocaleContext } from "./context.js";
