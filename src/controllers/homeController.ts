import type { ContextHandler } from "../types/context";
import { renderPage } from "../utils/respond";

export const showIndex: ContextHandler = async (ctx, _req, res) => {
  renderPage(res, ctx, "index", { title: "Notebook" });
};
