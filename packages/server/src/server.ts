import { createApp, createServices } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();
const app = createApp(createServices(config));

app.listen(config.PORT, () => {
  console.log(`\nLogistics network API running at http://localhost:${config.PORT}`);
  console.log(`Feature cache: ${config.CACHE_DIR}\n`);
});
