import type { ToolContext, ToolResult, UserRegisterInput } from "../types.js";
import { attempt } from "./result.js";

export async function userRegister(
  ctx: ToolContext,
  input: UserRegisterInput
): Promise<ToolResult<{ name: string }>> {
  return attempt(async () => {
    const name = await ctx.users.register(input.name);
    return { ok: true, message: `Registered ${name}`, data: { name } };
  });
}

export async function listUsers(ctx: ToolContext): Promise<ToolResult<string[]>> {
  return { ok: true, data: ctx.users.list() };
}
