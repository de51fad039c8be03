import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import routes from './routes';
import { errorHandler } from './middleware';
import { config } from './config';

const app = express();

app.use(cors({ origin: true }));
app.use(express.json());

app.use(routes);

// Rendered videos, subtitles and run summaries
app.use('/media', express.static(config.outputDir));

app.use(errorHandler);

export default app;
