import { confirmWith } from "../../runtime/console.js";
import type { ActionResult, OsRequest } from "../../os/actions.js";
import type { HandlerContext } from "../context.js";

const render = (result: ActionResult): string => `${result.ok ? "✓" : "✗"} ${result.message}`;

/** Requests the host cannot serve fail before the operator is asked. */
const gated = async (
  request: OsRequest,
  question: string,
  cancelled: string,
  ctx: HandlerContext,
  run: () => Promise<ActionResult>
): Promise<string> => {
  const unsupported = ctx.os.unsupported(request);
  if (unsupported !== null) return `✗ ${unsupported}`;
  if (!(await confirmWith(ctx.console, question))) return `✗ ${cancelled}`;
  return render(await run());
};

export const powerAction = async (action: string, ctx: HandlerContext): Promise<string> => {
  const name = action.trim();
  if (name.length === 0) return "✗ No power action given";
  return gated(
    { kind: "power", action: name },
    `Run power action '${name}'? (y/n)`,
    `Power action '${name}' cancelled`,
    ctx,
    () => ctx.os.power(name)
  );
};

/** Payload is `action|param`, e.g. `volume|up` or `网络|关闭`. */
export const systemControl = async (payload: string, ctx: HandlerContext): Promise<string> => {
  const idx = payload.indexOf("|");
  const action = (idx < 0 ? payload : payload.slice(0, idx)).trim();
  const param = idx < 0 ? "" : payload.slice(idx + 1).trim();
  if (action.length === 0 || param.length === 0) {
    return `✗ Malformed system control '${payload}'; expected action|param`;
  }
  return gated(
    { kind: "control", action, param },
    `Run system control '${action} ${param}'? (y/n)`,
    "System control cancelled",
    ctx,
    () => ctx.os.control(action, param)
  );
};

export const cleanSystem = async (ctx: HandlerContext): Promise<string> =>
  gated({ kind: "clean" }, "Run system cleanup? (y/n)", "System cleanup cancelled", ctx, () => ctx.os.clean());
