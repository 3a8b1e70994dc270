export { InvalidSessionStateError } from "./InvalidSessionStateError.js";
export { SessionCommandInputError } from "./SessionCommandInputError.js";
export { SessionIdExhaustedError } from "./SessionIdExhaustedError.js";
export {
  fail,
  notFound,
  ok,
  type FailureReason,
  type Result,
  type SessionFailure,
} from "./SessionFailure.js";
