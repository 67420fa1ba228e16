import { loadConfig } from "./config";
import { createApp } from "./app";

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.info(`NPC generator listening on port ${config.port}`);
});
