// userInfoSchema.ts - Authenticated user handed to a module by the host

import { z } from "zod";
import { PayloadMapSchema } from "./coreTypes.js";

export const UserInfoSchema = z.object({
  id: z.string().min(1),
  name: z.string().default("Unknown"),
  email: z.string().default(""),
  avatarUrl: z.string().url().optional(),
  roles: z.array(z.string()).optional(),
  metadata: PayloadMapSchema.default({}),
});

export type UserInfo = z.infer<typeof UserInfoSchema>;
export type UserInfoInput = z.input<typeof UserInfoSchema>;

export function hasRole(user: UserInfo, role: string): boolean {
  return user.roles?.includes(role) ?? false;
}
