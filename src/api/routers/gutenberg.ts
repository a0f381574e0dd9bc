// pattern: Imperative Shell
import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { router, publicProcedure } from "../trpc";
import { errorMessage, toTRPCError } from "../errors";
import { toBookDetail, toBookSummary } from "../../sources/gutenberg";

export const gutenbergRouter = router({
  search: publicProcedure
    .input(
      z.object({
        query: z.string().optional(),
        author: z.string().optional(),
        title: z.string().optional(),
        topic: z.string().optional(),
        language: z.string().default("en"),
        page: z.number().int().positive().default(1),
      }),
    )
    .query(async ({ ctx, input }) => {
      try {
        const result = await ctx.gutenberg.search(input);
        return { ...result, books: result.books.map(toBookSummary) };
      } catch (err) {
        ctx.logger.error({ error: errorMessage(err) }, "gutenberg search failed");
        throw toTRPCError(err, "Failed to search Project Gutenberg");
      }
    }),

  get: publicProcedure
    .input(z.object({ id: z.number().int().positive() }))
    .query(async ({ ctx, input }) => {
      const book = await ctx.gutenberg.getBook(input.id).catch((err: unknown) => {
        ctx.logger.error({ error: errorMessage(err), id: input.id }, "gutenberg lookup failed");
        throw toTRPCError(err, "Failed to fetch book details");
      });
      if (!book) {
        throw new TRPCError({ code: "NOT_FOUND", message: "Book not found" });
      }
      return toBookDetail(book);
    }),
});
