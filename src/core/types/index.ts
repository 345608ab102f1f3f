export { type Result, type Ok, type Err, ok, err, map, unwrapOr, tryCatchAsync } from "./result.js";
