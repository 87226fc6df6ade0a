export {
  createExpressHttpContext,
  expressSession,
  toExpressMiddleware,
  type ExpressNext,
  type ExpressSessionAdapterOptions,
  type ExpressSessionHandler,
  type ExpressSessionRequest,
  type ExpressSessionResponse,
} from "./ExpressAdapter";
