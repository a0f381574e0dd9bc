// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";

export const sessionRouter = router({
  me: publicProcedure.query(({ ctx }) => ctx.session?.user ?? null),
});
