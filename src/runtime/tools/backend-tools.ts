import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { InternalApiClient, QueryValue } from "../../adapter/backend/internal-api.js";
import type { JsonObject } from "../../types/chat.js";
import type { ToolDefinition } from "../../types/model.js";
import type { ToolHandler, ToolOutput, ToolRegistry } from "./registry.js";

/**
 * 백엔드 엔드포인트로 그대로 위임하는 도구들을 카탈로그 파일에서 읽어 등록한다.
 */

const routeSchema = z.object({
  method: z.enum(["GET", "POST"]),
  path: z.string().startsWith("/"),
  query: z.array(z.string()).optional(),
  resultField: z.string().optional(),
});

const catalogEntrySchema = z.object({
  name: z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/),
  description: z.string().min(1),
  input_schema: z.object({ type: z.literal("object") }).passthrough(),
  route: routeSchema,
});

export const toolCatalogSchema = z.object({ tools: z.array(catalogEntrySchema) });

export type BackendToolRoute = z.infer<typeof routeSchema>;
export type BackendToolEntry = z.infer<typeof catalogEntrySchema>;

export async function loadToolCatalog(pathname: string): Promise<BackendToolEntry[]> {
  const raw = await readFile(pathname, "utf-8");
  return toolCatalogSchema.parse(JSON.parse(raw)).tools;
}

export function resolveRoutePath(template: string, userId: string): string {
  return template.replaceAll("{user_id}", encodeURIComponent(userId));
}

function toQueryValue(value: unknown): QueryValue | undefined {
  if (typeof value === "string") {
    return value.length > 0 ? value : undefined;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return undefined;
}

export function createBackendToolHandler(client: InternalApiClient, route: BackendToolRoute): ToolHandler {
  return async (_toolName: string, input: JsonObject, userId: string): Promise<ToolOutput> => {
    const path = resolveRoutePath(route.path, userId);
    const response =
      route.method === "GET"
        ? await client.request("GET", path, userId, {
            query: Object.fromEntries((route.query ?? []).map((key) => [key, toQueryValue(input[key])])),
          })
        : await client.request("POST", path, userId, { body: input });

    if (route.resultField) {
      const field = response[route.resultField];
      if (typeof field === "string" && field.length > 0) {
        return field;
      }
    }
    return response;
  };
}

export function toToolDefinition(entry: BackendToolEntry): ToolDefinition {
  return {
    name: entry.name,
    description: entry.description,
    input_schema: entry.input_schema,
  };
}

export function registerBackendTools(registry: ToolRegistry, client: InternalApiClient, entries: BackendToolEntry[]): void {
  for (const entry of entries) {
    registry.register(toToolDefinition(entry), createBackendToolHandler(client, entry.route));
  }
}
