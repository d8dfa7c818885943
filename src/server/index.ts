import "dotenv/config";
import { buildServer } from "./app.js";

const PORT = parseInt(process.env["PORT"] ?? "3100", 10);
const HOST = process.env["HOST"] ?? "0.0.0.0";

async function main(): Promise<void> {
  const server = buildServer();

  try {
    await server.listen({ port: PORT, host: HOST });
    console.log(`🚀 Blender Scene AI server running on http://${HOST}:${PORT}`);
    console.log(`   Health: http://localhost:${PORT}/health`);
    console.log(`   POST /prompts/analyze, /code/validate, /code/fix, /generate`);
    console.log(`   GET  /runs/:id`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
