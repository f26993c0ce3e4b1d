import { createServer } from "./index";
import { MaterialCatalog } from "./cluster/materials";
import { settings } from "./settings";

(async () => {
  try {
    const catalog = MaterialCatalog.fromFile(settings.data.materials);
    const app = await createServer({ catalog });
    app.log.info({ file: settings.data.materials, materials: catalog.size }, "material catalog loaded");
    await app.listen({ port: settings.port, host: settings.host });
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        app.log.info({ signal }, "shutting down");
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error({ err, signal }, "error during shutdown");
            process.exit(1);
          },
        );
      });
    }
  } catch (err) {
    console.error(err);
    process.exit(1);
  }
})();
