import { FastifyInstance, FastifyPluginCallback, FastifyReply, FastifyRequest } from "fastify";
import type { ClusterPrinterStatus } from "types/cluster";
import { MaterialCatalog } from "../cluster/materials";
import { ClusterPayloadError, parseClusterStatus, parsePrinterStatus } from "../cluster/parse";
import { DEFAULT_BUILDPLATE, createOutputModel } from "../cluster/printer-status";
import { ConfigurationResolver } from "../cluster/resolver";
import { settings } from "../settings";
import {
  ClusterPrintersResponseSchema,
  ConfigurationsResponseSchema,
  ErrorResponseSchema,
} from "../schemas";

export type ClusterRouteOptions = {
  catalog: MaterialCatalog;
};

function payloadErrorResponse(reply: FastifyReply, err: unknown) {
  if (err instanceof ClusterPayloadError) {
    reply.code(400);
    return { error: err.message, issues: err.issues };
  }
  throw err;
}

export const clusterRoute: FastifyPluginCallback<ClusterRouteOptions> = (
  app: FastifyInstance,
  opts: ClusterRouteOptions,
  done: () => void,
) => {
  const { catalog } = opts;

  app.post(
    "/cluster/printers",
    {
      schema: {
        tags: ["cluster"],
        response: {
          200: ClusterPrintersResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (req: FastifyRequest, reply: FastifyReply) => {
      let printers: ClusterPrinterStatus[];
      try {
        printers = parseClusterStatus(req.body ?? {});
      } catch (err) {
        return payloadErrorResponse(reply, err);
      }
      req.log.debug({ printers: printers.length }, "projecting cluster status");
      const models = printers.map((status) =>
        createOutputModel(status, { catalog, cameraStreamPort: settings.cameraStreamPort }).toJSON(),
      );
      return { printers: models };
    },
  );

  app.post(
    "/cluster/printers/configurations",
    {
      schema: {
        tags: ["cluster"],
        response: {
          200: ConfigurationsResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (req: FastifyRequest, reply: FastifyReply) => {
      let status: ClusterPrinterStatus;
      try {
        status = parsePrinterStatus(req.body ?? {});
      } catch (err) {
        return payloadErrorResponse(reply, err);
      }
      const resolver = new ConfigurationResolver(catalog);
      const active = resolver
        .resolveActive(status, status.configuration.length)
        .map((pair) => pair.extruderConfiguration);
      const available = resolver.resolveAvailable(status, {
        printerType: status.machine_variant,
        buildplateConfiguration: status.build_plate?.type ?? DEFAULT_BUILDPLATE,
      });
      return { active, available: available ?? null };
    },
  );

  done();
};
