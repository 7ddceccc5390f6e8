export {
  flattenMultipartRequests,
  HttpRequest,
} from "./request.js";
export type {
  HttpRequestInit,
  MultipartMixedInfo,
  MultipartMixedOptions,
  QueryValue,
  RequestBody,
} from "./request.js";
export { BufferedHttpResponse } from "./response.js";
export type { HttpResponse, HttpResponseInit } from "./response.js";
export {
  parseHttpResponseMessage,
  parseMultipartBoundary,
  serializeMultipartBody,
  splitMultipartBody,
} from "./multipart.js";
export type { MimePart, RawHttpResponse } from "./multipart.js";
