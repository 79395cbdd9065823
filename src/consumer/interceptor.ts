/** Describes the call passing through an interceptor chain. */
export interface InvocationContext {
  /** Operation being invoked, e.g. `"consume"`. */
  readonly operation: string;
  /** Topic the call relates to, when there is one. */
  readonly topic?: string;
  readonly groupName?: string;
  /** Free-form attributes interceptors may read. */
  readonly attributes?: Readonly<Record<string, string | number | boolean>>;
}

/** The real call at the end of a chain. */
export type Invoker<Req = unknown, Reply = unknown> = (
  ctx: InvocationContext,
  req: Req,
  reply: Reply,
) => Promise<void>;

/**
 * A cross-cutting hook around an invocation. Call `next` to continue down the
 * chain; code before `next` runs on entry, code after it on the return path.
 */
export type Interceptor<Req = unknown, Reply = unknown> = (
  ctx: InvocationContext,
  req: Req,
  reply: Reply,
  next: Invoker<Req, Reply>,
) => Promise<void>;

/**
 * Compose interceptors into one.
 * The first interceptor is the outermost: it sees the call before every other
 * interceptor and the return after all of them.
 * Returns `undefined` for an empty list.
 */
export function chainInterceptors<Req, Reply>(
  interceptors: readonly Interceptor<Req, Reply>[],
): Interceptor<Req, Reply> | undefined {
  if (interceptors.length === 0) return undefined;
  if (interceptors.length === 1) return interceptors[0];

  return (ctx, req, reply, invoker) => {
    const dispatch = (index: number): Invoker<Req, Reply> => {
      if (index === interceptors.length) return invoker;
      const current = interceptors[index];
      return (c, rq, rp) => current(c, rq, rp, dispatch(index + 1));
    };
    return dispatch(0)(ctx, req, reply);
  };
}

/** Run `invoker` through `interceptors`, or directly when there are none. */
export function invokeWithInterceptors<Req, Reply>(
  interceptors: readonly Interceptor<Req, Reply>[],
  ctx: InvocationContext,
  req: Req,
  reply: Reply,
  invoker: Invoker<Req, Reply>,
): Promise<void> {
  const chained = chainInterceptors(interceptors);
  return chained ? chained(ctx, req, reply, invoker) : invoker(ctx, req, reply);
}
