import { Hono } from "hono";
import { generate } from "./generate.routes.js";
import { templates } from "./template.routes.js";
import { embeddings } from "./embedding.routes.js";
import { health } from "./health.routes.js";
import type { AppEnv } from "../app.js";

const routes = new Hono<AppEnv>();

routes.route("/", generate);
routes.route("/", templates);
routes.route("/", embeddings);
routes.route("/", health);

export { routes };
