import { type Context, ValidationError } from "@pagesim/server"

/** Parsed JSON body; an empty body reads as `{}`. */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text()
  if (text.trim() === "") return {}

  try {
    return JSON.parse(text)
  } catch {
    throw new ValidationError(
      [{ path: "", message: "Request body must be valid JSON" }],
      "Request body must be valid JSON",
    )
  }
}
