export { httpRequest, buildUrl } from "./httpClient";
export { HttpError } from "./httpError";
