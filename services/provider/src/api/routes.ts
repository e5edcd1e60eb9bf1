import type { FastifyPluginAsync } from "fastify";
import type { AppDeps } from "../types/deps.js";
import type { VmDiskSpec, VmSpec } from "../types/vm.js";

export const API_PREFIX = "/api/v1alpha1";

export interface ApiPluginOptions {
  deps: AppDeps;
}

type VmSpecBody = Omit<VmSpec, "disks"> & { disks?: VmDiskSpec[] };

const vmSpecSchema = {
  type: "object",
  additionalProperties: false,
  required: ["vcpu", "memory", "guestOS"],
  properties: {
    vcpu: { type: "integer", minimum: 1 },
    memory: { type: "string", minLength: 1, description: 'Quantity such as "2Gi", "2GB" or a bare MiB count' },
    guestOS: { type: "string", minLength: 1 },
    disks: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["name"],
        properties: {
          name: { type: "string", minLength: 1 },
          capacity: { type: "string" }
        }
      }
    },
    sshKeys: { type: "array", items: { type: "string" } },
    hostname: { type: "string" },
    architecture: { type: "string" }
  }
} as const;

const vmViewSchema = { type: "object", additionalProperties: true } as const;
const errorSchema = {
  type: "object",
  properties: { message: { type: "string" }, requestId: { type: "string" } }
} as const;
const idParamsSchema = {
  type: "object",
  required: ["id"],
  properties: { id: { type: "string" } }
} as const;

export const apiPlugin: FastifyPluginAsync<ApiPluginOptions> = async (app, opts) => {
  const { deps } = opts;

  app.get(
    `${API_PREFIX}/health`,
    {
      schema: {
        summary: "Service health",
        description: "Event bus connectivity and the number of live status watches.",
        tags: ["health"],
        security: [],
        response: { 200: { type: "object", additionalProperties: true } }
      }
    },
    async () => deps.health()
  );

  app.get(
    `${API_PREFIX}/vms`,
    {
      schema: {
        summary: "List VMs",
        tags: ["vms"],
        response: { 200: { type: "array", items: vmViewSchema } }
      }
    },
    async () => deps.vmService.list()
  );

  app.post<{ Body: VmSpecBody; Querystring: { id?: string } }>(
    `${API_PREFIX}/vms`,
    {
      bodyLimit: 64 * 1024,
      schema: {
        summary: "Create VM",
        description: "Creates the VM and starts tracking its status. Passing an existing id returns that VM unchanged.",
        tags: ["vms"],
        querystring: { type: "object", properties: { id: { type: "string" } } },
        body: vmSpecSchema,
        response: { 200: vmViewSchema, 201: vmViewSchema, 400: errorSchema, 409: errorSchema, 422: errorSchema }
      }
    },
    async (request, reply) => {
      const body = request.body;
      const spec: VmSpec = { ...body, disks: body.disks ?? [] };
      const result = await deps.vmService.create(spec, { id: request.query.id });
      reply.code(result.created ? 201 : 200);
      return result.vm;
    }
  );

  app.get<{ Params: { id: string } }>(
    `${API_PREFIX}/vms/:id`,
    {
      schema: {
        summary: "Get VM",
        tags: ["vms"],
        params: idParamsSchema,
        response: { 200: vmViewSchema, 404: errorSchema }
      }
    },
    async (request) => deps.vmService.get(request.params.id)
  );

  app.delete<{ Params: { id: string } }>(
    `${API_PREFIX}/vms/:id`,
    {
      schema: {
        summary: "Delete VM",
        tags: ["vms"],
        params: idParamsSchema,
        response: { 204: { type: "null" }, 404: errorSchema }
      }
    },
    async (request, reply) => {
      await deps.vmService.delete(request.params.id);
      reply.code(204);
      return;
    }
  );
};
