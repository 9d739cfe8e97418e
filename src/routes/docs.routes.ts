/**
 * Documentation Routes
 * - Landing page (/docs)
 * - API Reference via Swagger UI (/docs/api)
 * - Raw OpenAPI document (/docs/openapi.json)
 */

import { Router, Request, Response } from "express";
import swaggerUi from "swagger-ui-express";
import { swaggerSpec } from "../config/swagger.js";
import { API } from "../config/constants.js";

const router = Router();

const sections = [
  {
    href: "/docs/api",
    title: "API Reference",
    description: "Interactive Swagger UI with every endpoint and response shape.",
  },
  {
    href: "/docs/openapi.json",
    title: "OpenAPI Document",
    description: "The OpenAPI 3.1 document behind the reference, for client generators.",
  },
  {
    href: "/health",
    title: "Health",
    description: "Whether a network is loaded, path and ride counts, and the active store.",
  },
];

/**
 * Wrap content in the base HTML template
 */
function wrapInHtml(title: string, content: string): string {
  return `<!DOCTYPE html>
<html lang="en" class="h-full">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title} - Bridleway Log Docs</title>
  <script src="https://cdn.tailwindcss.com"></script>
</head>
<body class="h-full bg-gray-900 text-gray-100">
  <main class="max-w-4xl mx-auto px-6 py-12">
    ${content}
  </main>
</body>
</html>`;
}

// ============================================
// Landing Page
// ============================================

/**
 * GET /docs
 */
router.get("/", (req: Request, res: Response) => {
  const cards = sections
    .map(
      (section) => `
      <a href="${section.href}" class="block p-6 bg-gray-800 rounded-lg hover:bg-gray-700 transition-colors">
        <h2 class="text-xl font-semibold text-white mb-2">${section.title}</h2>
        <p class="text-gray-400">${section.description}</p>
      </a>`
    )
    .join("\n");

  const content = `
    <div class="text-center mb-12">
      <h1 class="text-4xl font-bold text-white mb-4">Bridleway Log API Documentation</h1>
      <p class="text-xl text-gray-400">Ridden coverage of a rights-of-way network, from uploaded GPX rides.</p>
      <p class="mt-4 text-gray-500">All endpoints are under <code>${API.PREFIX}</code>.</p>
    </div>
    <div class="grid grid-cols-1 md:grid-cols-3 gap-6">
      ${cards}
    </div>`;

  res.type("html").send(wrapInHtml("Home", content));
});

// ============================================
// API Reference
// ============================================

router.get("/openapi.json", (req: Request, res: Response) => {
  res.json(swaggerSpec);
});

/**
 * GET /docs/api
 * Swagger UI for interactive API documentation
 */
router.use("/api", swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
  customCss: `
    .swagger-ui .topbar { display: none; }
  `,
  customSiteTitle: "Bridleway Log API Reference",
}));

export default router;
