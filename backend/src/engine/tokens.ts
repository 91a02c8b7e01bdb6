export const CONFIG_DOCUMENT = Symbol("CONFIG_DOCUMENT");
export const ENGINE_SETTINGS = Symbol("ENGINE_SETTINGS");
export const NEMWEB_FETCH = Symbol("NEMWEB_FETCH");
