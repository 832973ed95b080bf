import { z } from "zod";
import type { PropertyDirectory, PropertyGroup, PropertyRecord } from "@showing-desk/domain";
import { requestJson } from "@showing-desk/shared";

const TIMEOUT_MS = 10_000;

// AppFolio sends null for blank text fields.
const text = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const propertySchema = z.object({
  Id: z.coerce.string(),
  Name: text,
  Address1: text,
  City: text,
  State: text,
  PropertyGroupIds: z.array(z.coerce.string()).nullish()
});

const propertyResponseSchema = z.object({ data: z.array(propertySchema) });

const groupResponseSchema = z.object({
  data: z.array(z.object({ Id: z.coerce.string(), Name: text }))
});

export type AppFolioClientOptions = {
  baseUrl: string;
  authHeader: string;
  developerId: string;
};

export class AppFolioClient implements PropertyDirectory {
  constructor(private readonly options: AppFolioClientOptions) {}

  async getProperty(propertyId: string, signal?: AbortSignal): Promise<PropertyRecord> {
    const url = `${this.options.baseUrl}/api/v0/properties?filters[Id]=${encodeURIComponent(propertyId)}`;
    const body = propertyResponseSchema.parse(await this.get(url, "AppFolio (Property)", signal));

    const property = body.data[0];
    if (!property) throw new Error(`property not found: ${propertyId}`);

    return {
      id: property.Id,
      name: property.Name,
      address: property.Address1,
      city: property.City,
      state: property.State,
      groupIds: property.PropertyGroupIds ?? []
    };
  }

  async getPropertyGroups(groupIds: readonly string[], signal?: AbortSignal): Promise<PropertyGroup[]> {
    if (groupIds.length === 0) return [];

    const ids = groupIds.map(encodeURIComponent).join(",");
    const url = `${this.options.baseUrl}/api/v0/property_groups?filters[Id]=${ids}`;
    const body = groupResponseSchema.parse(await this.get(url, "AppFolio (Groups)", signal));
    return body.data.map((g) => ({ id: g.Id, name: g.Name }));
  }

  private get(url: string, service: string, signal?: AbortSignal) {
    return requestJson(
      url,
      {
        method: "GET",
        headers: {
          Authorization: this.options.authHeader,
          "X-AppFolio-Developer-ID": this.options.developerId
        }
      },
      { service, timeoutMs: TIMEOUT_MS, signal }
    );
  }
}
