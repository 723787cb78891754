import 'dotenv/config';
import { buildComponents, envDefaults, loadServerConfig } from './config';
import { createApp } from './app';

const config = loadServerConfig({ ...envDefaults(), port: Number(process.env.PORT || 4000) });
const { segmenter, extractor, writer } = buildComponents(config);

const app = createApp({ segmenter, extractor, renderer: writer });

const PORT = config.port;
app.listen(PORT, () => {
  console.log(`========================================`);
  console.log(`API Server listening on port ${PORT}`);
  console.log(`========================================`);
  console.log(`Health check: http://localhost:${PORT}/api/health`);
  console.log(`Annotate endpoint: http://localhost:${PORT}/api/annotate`);
});
