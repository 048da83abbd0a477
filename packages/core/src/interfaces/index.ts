export type { IModelInvoker, InvokeRequest } from './invoker.js';
export type {
  IObserver,
  RequestEvent,
  InvocationEvent,
  TokenUsage,
} from './observer.js';
