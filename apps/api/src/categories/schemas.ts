// apps/api/src/categories/schemas.ts
import { z } from "zod";

export const CategoryBody = z.object({
  name: z.string().trim().min(1, "name is required"),
  icon: z.string().trim().optional(),
});
