import { Hono } from "hono";
import { TRENDING_STYLES, extractStyleKeywords, styleSuggestions } from "../services/styleQuery.js";

const styles = new Hono();

/**
 * GET /styles?q= - Trending styles, autocomplete suggestions and the vocabulary words found in q
 */
styles.get("/", (c) => {
  const query = (c.req.query("q") ?? "").trim();

  return c.json({
    trending: TRENDING_STYLES,
    suggestions: query ? styleSuggestions(query) : [],
    keywords: query ? extractStyleKeywords(query) : [],
  });
});

export default styles;
