export { appcypherServerSource, parseAppcypherLine, APPCYPHER_SOURCE_ID } from "./appcypherSource";
