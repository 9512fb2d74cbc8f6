import express from "express";
import path from "path";
import { readFileSync } from "fs";
import swaggerUi from "swagger-ui-express";

const webDir = path.join(process.cwd(), "src", "web");

const router = express.Router();

const swaggerDocument = JSON.parse(readFileSync(path.join(webDir, "swagger.json"), "utf8"));

// Swagger UI options with minimal customization
const swaggerOptions = {
  customCss: `
    .swagger-ui .topbar { display: none }
  `,
  customSiteTitle: "Zone Locator API Documentation",
  swaggerOptions: {
    docExpansion: "none",
    defaultModelsExpandDepth: 1,
    defaultModelExpandDepth: 1,
  },
};

router.use("/admin/api", swaggerUi.serve, swaggerUi.setup(swaggerDocument, swaggerOptions));

export default router;
