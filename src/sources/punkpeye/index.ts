export { punkpeyeServerSource, parsePunkpeyeLine, PUNKPEYE_SOURCE_ID } from "./punkpeyeSource";
