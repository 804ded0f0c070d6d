import { FastifyInstance } from 'fastify';
import { ImageController } from '@api/controllers/image.controller';
import { JobController } from '@api/controllers/job.controller';
import { UploadController } from '@api/controllers/upload.controller';
import { Pipeline } from '@services/pipeline';

export async function registerRoutes(server: FastifyInstance, pipeline: Pipeline): Promise<void> {
  const uploadController = new UploadController(pipeline.service, pipeline.config.storage.maxFileSizeBytes);
  const imageController = new ImageController(pipeline.service);
  const jobController = new JobController(pipeline.service);

  // Image routes
  server.post('/images', uploadController.uploadFile.bind(uploadController));
  server.get('/images/:id', imageController.get.bind(imageController));
  server.get('/images/:id/metadata', imageController.metadata.bind(imageController));
  server.delete('/images/:id', imageController.delete.bind(imageController));
  server.post('/images/:id/transform', imageController.transform.bind(imageController));

  // Job routes
  server.get('/jobs/:jobId', jobController.getStatus.bind(jobController));
  server.get('/jobs/:jobId/result', jobController.getResult.bind(jobController));
  server.delete('/jobs/:jobId', jobController.cancel.bind(jobController));
}
