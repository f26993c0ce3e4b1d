import { FastifyInstance, FastifyPluginCallback } from "fastify";
import { MaterialCatalog } from "../cluster/materials";
import { MaterialsResponseSchema } from "../schemas";

export const materialsRoute: FastifyPluginCallback<{ catalog: MaterialCatalog }> = (
  app: FastifyInstance,
  opts,
  done,
) => {
  app.get(
    "/materials",
    {
      schema: {
        tags: ["materials"],
        response: {
          200: MaterialsResponseSchema,
        },
      },
    },
    async () => ({ materials: opts.catalog.entries() }),
  );
  done();
};
