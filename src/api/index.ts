import { createTutor } from "../services";
import { createApp } from "./app";

const tutor = createTutor();
const app = createApp(tutor.controller, tutor.observability);
const PORT = tutor.config.port;

// Start server
app.listen(PORT, () => {
  console.log(`Times table tutor API running on http://localhost:${PORT}`);
  console.log(`Sessions are stored in ${tutor.config.dataDir}`);
});

export default app;
