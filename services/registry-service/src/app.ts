import { buildServer } from "./server.js";

const port = Number(process.env.PORT || 0) || 4110;
const host = process.env.HOST || "0.0.0.0";

buildServer()
  .then((app) => app.listen({ port, host }))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
