import type { ServerResponse } from 'http';
import type { SwaggerDocument } from '../openapi.js';
import { sendJson, sendText } from '../response-helpers.js';

export const SWAGGER_JSON_PATH = '/docs/swagger.json';

function swaggerUiPage(title: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${title} API</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5/swagger-ui.css">
</head>
<body>
<div id="swagger-ui"></div>
<script src="https://unpkg.com/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
<script>
  window.onload = function () {
    window.ui = SwaggerUIBundle({ url: '${SWAGGER_JSON_PATH}', dom_id: '#swagger-ui' });
  };
</script>
</body>
</html>`;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function handleSwaggerJson(
  res: ServerResponse,
  document: SwaggerDocument,
): void {
  sendJson(res, document);
}

export function handleDocs(res: ServerResponse, title: string): void {
  sendText(res, swaggerUiPage(escapeHtml(title)), 'text/html; charset=utf-8');
}
