export {
  createHonoHttpContext,
  getHonoSession,
  honoSession,
  toHonoMiddleware,
  type HonoSessionAdapterOptions,
  type SessionEnv,
} from "./HonoAdapter";
