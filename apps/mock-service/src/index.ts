//apps/mock-service/src/index.ts
import { createApp } from "./app";

const apiKey = process.env.MOCK_SERVICE_API_KEY || "local-dev-key";
const maxItems = process.env.MOCK_SERVICE_MAX_ITEMS ? Number(process.env.MOCK_SERVICE_MAX_ITEMS) : undefined;
const port = process.env.PORT ? Number(process.env.PORT) : 8787;

const app = createApp({ apiKey, maxItems });

app.listen(port, () => {
  console.log(`mock-service listening on http://localhost:${port}/adaptive-testing`);
  console.log(`api key: ${apiKey}`);
});
