// ---------------------------------------------------------------------------
// InterceptorChain — Fixed, ordered set of traffic hooks for one client
// ---------------------------------------------------------------------------

import type {
  GatewayInterceptor,
  OutboundMessage,
  InboundMessage,
  GatewayInterceptorEvent,
  ErrorContext,
} from "./interface";

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * The hooks a {@link GatewayClient} was built with, in construction order.
 *
 * A hook never breaks traffic: whatever it throws is handed to the `onError`
 * hooks, tagged with the thrower's name, and the frame moves on unchanged.
 */
export class InterceptorChain {
  private readonly hooks: readonly GatewayInterceptor[];

  constructor(interceptors: readonly GatewayInterceptor[] = []) {
    this.hooks = [...interceptors];
  }

  async outbound(message: OutboundMessage): Promise<OutboundMessage> {
    let current = message;
    for (const hook of this.hooks) {
      const onOutbound = hook.onOutbound;
      if (!onOutbound) continue;
      const seen = current;
      const next = await this.guard(hook, { phase: "outbound", message: seen }, () =>
        onOutbound.call(hook, seen),
      );
      current = next ?? seen;
    }
    return current;
  }

  async inbound(message: InboundMessage): Promise<InboundMessage> {
    let current = message;
    for (const hook of this.hooks) {
      const onInbound = hook.onInbound;
      if (!onInbound) continue;
      const seen = current;
      const next = await this.guard(hook, { phase: "inbound", message: seen }, () =>
        onInbound.call(hook, seen),
      );
      current = next ?? seen;
    }
    return current;
  }

  async event(event: GatewayInterceptorEvent): Promise<void> {
    for (const hook of this.hooks) {
      const onEvent = hook.onEvent;
      if (!onEvent) continue;
      await this.guard(hook, { phase: "event", message: event }, () => onEvent.call(hook, event));
    }
  }

  /**
   * Hand an error to every `onError` hook. A failing error hook is skipped;
   * reporting it would recurse.
   */
  async report(error: Error, context: ErrorContext): Promise<void> {
    for (const hook of this.hooks) {
      if (!hook.onError) continue;
      try {
        await hook.onError(error, context);
      } catch {
        // an error hook failing has nowhere left to report to
      }
    }
  }

  private async guard<T>(
    hook: GatewayInterceptor,
    context: ErrorContext,
    call: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await call();
    } catch (err) {
      await this.report(toError(err), { ...context, interceptor: hook.name });
      return undefined;
    }
  }
}
