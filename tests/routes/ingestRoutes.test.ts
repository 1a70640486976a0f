import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createTestApp, type TestApp } from '../helpers/testApp.js';

const INGEST_QUERY = {
  country: 'egypt',
  lawType: 'criminal',
  lawName: 'قانون تجريبي',
  filename: 'sample.pdf',
};

describe('POST /api/v1/ingest', () => {
  let testApp: TestApp;

  beforeEach(() => {
    testApp = createTestApp();
  });

  it('ingests a PDF into the country collection', async () => {
    const res = await request(testApp.app)
      .post('/api/v1/ingest')
      .query(INGEST_QUERY)
      .set('Content-Type', 'application/pdf')
      .send(Buffer.alloc(2048));

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      success: true,
      collection: 'laws_egypt',
      articlesFound: 3,
      chunksCreated: 3,
      pagesProcessed: 2,
      errors: [],
      message: "Law 'قانون تجريبي' ingested successfully",
    });
    expect(testApp.vectorStore.collections.get('laws_egypt')?.points.size).toBe(3);
  });

  it('rejects a body too small to be a PDF', async () => {
    const res = await request(testApp.app)
      .post('/api/v1/ingest')
      .query(INGEST_QUERY)
      .set('Content-Type', 'application/pdf')
      .send(Buffer.alloc(500));

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('BAD_REQUEST');
    expect(res.body.message).toBe('File too small to be a valid PDF');
    expect(res.body.context).toEqual({ bytes: 500 });
  });

  it('rejects an unsupported country', async () => {
    const res = await request(testApp.app)
      .post('/api/v1/ingest')
      .query({ ...INGEST_QUERY, country: 'atlantis' })
      .set('Content-Type', 'application/pdf')
      .send(Buffer.alloc(2048));

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Validation failed');
    expect(res.body.context.details[0].path).toBe('country');
  });

  it('rejects a non-PDF file name', async () => {
    const res = await request(testApp.app)
      .post('/api/v1/ingest')
      .query({ ...INGEST_QUERY, filename: 'notes.docx' })
      .set('Content-Type', 'application/pdf')
      .send(Buffer.alloc(2048));

    expect(res.status).toBe(400);
    expect(res.body.context.details).toEqual([{ path: 'filename', message: 'Only PDF files are supported' }]);
  });

  it('rejects a body sent without the PDF content type', async () => {
    const res = await request(testApp.app)
      .post('/api/v1/ingest')
      .query(INGEST_QUERY)
      .set('Content-Type', 'text/plain')
      .send('not a pdf');

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Request body must be a PDF sent with Content-Type: application/pdf');
  });

  it('reports step errors when extraction fails', async () => {
    testApp.textSource.extractPages = async () => {
      throw new Error('corrupt file');
    };

    const res = await request(testApp.app)
      .post('/api/v1/ingest')
      .query(INGEST_QUERY)
      .set('Content-Type', 'application/pdf')
      .send(Buffer.alloc(2048));

    expect(res.status).toBe(500);
    expect(res.body).toMatchObject({
      error: 'PipelineExecutionError',
      code: 'PIPELINE_EXECUTION_ERROR',
      message: 'PDF Loader: corrupt file',
      statusCode: 500,
      path: '/api/v1/ingest',
    });
  });
});
