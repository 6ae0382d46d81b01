import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import RedisMock from 'ioredis-mock';
import { Kysely } from 'kysely';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { MappingProvenance } from '../src/database/repositories';
import { DatabaseService } from '../src/db/database.service';
import { DbRouter } from '../src/db/db-router';
import { DB } from '../src/db/types';
import { REDIS_CLIENT } from '../src/redis/redis.constants';
import { createTestDatabase, seedVocabulary } from './utils/test-database';

interface MappingBody {
  mappingId: number;
  omopConceptId: number;
  provenance: MappingProvenance;
}

describe('Concept dictionary API (e2e)', () => {
  let app: INestApplication;
  let db: Kysely<DB>;

  beforeEach(async () => {
    db = await createTestDatabase();
    const redis = new RedisMock();
    await redis.flushall();

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(DatabaseService)
      .useValue({ db: new DbRouter(db) })
      .overrideProvider(REDIS_CLIENT)
      .useValue(redis)
      .compile();

    app = moduleRef.createNestApplication();
    app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    await db.destroy();
  });

  it('GET /health', async () => {
    const res = await request(app.getHttpServer()).get('/health').expect(200);
    expect(res.body.status).toBe('ok');
  });

  it('POST /api/mappings/enrich answers 503 before the vocabulary is loaded', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/mappings/enrich')
      .send({})
      .expect(503);
    expect(res.body.message).toBe(
      'OHDSI vocabularies not loaded. Please configure the vocabulary database in Settings.',
    );
  });

  describe('with a vocabulary', () => {
    beforeEach(async () => {
      await seedVocabulary(db, {
        concepts: [
          { conceptId: 90, conceptName: 'Disorder' },
          { conceptId: 100, conceptName: 'Hypertension' },
          { conceptId: 101, conceptName: 'Hypertensive disorder' },
          { conceptId: 102, conceptName: 'Essential hypertension' },
        ],
        relationships: [
          { conceptId1: 100, conceptId2: 101, relationshipId: 'Maps to' },
        ],
        hierarchy: [
          [90, 100],
          [100, 102],
        ],
      });
    });

    it('GET /health/db', async () => {
      const res = await request(app.getHttpServer()).get('/health/db').expect(200);
      expect(res.body.database).toEqual({ connected: true, conceptCount: 4 });
    });

    it('GET /api/vocabulary/concepts/:id', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/vocabulary/concepts/100')
        .expect(200);
      expect(res.body.name).toBe('Hypertension');

      await request(app.getHttpServer())
        .get('/api/vocabulary/concepts/404')
        .expect(404);
      await request(app.getHttpServer())
        .get('/api/vocabulary/concepts/abc')
        .expect(400);
    });

    it('GET /api/vocabulary/concepts?query=', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/vocabulary/concepts?query=hypertension&limit=1')
        .expect(200);
      expect(res.body).toEqual([
        {
          score: 1,
          concept: expect.objectContaining({ conceptId: 100, name: 'Hypertension' }),
        },
      ]);

      await request(app.getHttpServer())
        .get('/api/vocabulary/concepts?query=hypertension&limit=1.5')
        .expect(400);
      await request(app.getHttpServer())
        .get('/api/vocabulary/concepts?query=%20')
        .expect(400);
    });

    it('GET /api/mappings/history', async () => {
      const server = app.getHttpServer();
      await request(server)
        .post('/api/mappings')
        .send({ generalConceptId: 1, omopConceptId: 100, comment: 'reviewed' })
        .expect(201);

      const res = await request(server)
        .get('/api/mappings/history?generalConceptId=1')
        .expect(200);
      expect(res.body).toEqual([
        {
          historyId: 1,
          createdAt: expect.any(String),
          action: 'insert',
          generalConceptId: 1,
          omopConceptId: 100,
          vocabularyId: 'SNOMED',
          conceptCode: '100',
          conceptName: 'Hypertension',
          comment: 'reviewed',
        },
      ]);

      await request(server).get('/api/mappings/history?limit=0').expect(400);
      await request(server)
        .get('/api/mappings/history?generalConceptId=3abc')
        .expect(400);
    });

    it('GET /api/hierarchy/:conceptId/count', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/hierarchy/100/count')
        .expect(200);
      expect(res.body).toEqual({
        ancestorCount: 1,
        descendantCount: 1,
        totalCount: 2,
        edgeCount: 2,
        maxLevelsUp: 5,
        maxLevelsDown: 5,
        threshold: 100,
        exceedsThreshold: false,
      });

      await request(app.getHttpServer())
        .get('/api/hierarchy/100/count?maxLevelsDown=11')
        .expect(400);
    });

    it('GET /api/hierarchy/:conceptId/graph', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/hierarchy/100/graph?maxLevelsUp=0&maxLevelsDown=1')
        .expect(200);

      expect(res.body.nodes.map((n: { id: number }) => n.id)).toEqual([100, 102]);
      expect(res.body.edges).toEqual([{ source: 100, target: 102 }]);
    });

    it('curates mappings and enriches them', async () => {
      const server = app.getHttpServer();

      await request(server)
        .post('/api/mappings')
        .send({ generalConceptId: 1, omopConceptId: 100, recommended: true })
        .expect(201);
      await request(server)
        .post('/api/mappings')
        .send({ generalConceptId: 1, omopConceptId: 100 })
        .expect(409);
      await request(server)
        .post('/api/mappings')
        .send({ generalConceptId: 'one', omopConceptId: 100 })
        .expect(400);

      const sync = await request(server)
        .post('/api/mappings/enrich')
        .send({})
        .expect(200);
      expect(sync.body).toMatchObject({
        preserveRecommended: false,
        manualCount: 1,
        derivedCount: 2,
      });

      const status = await request(server)
        .get('/api/mappings/enrich/status')
        .expect(200);
      expect(status.body).toEqual({
        lastSyncedAt: sync.body.syncedAt,
        manualCount: 1,
        derivedCount: 2,
      });

      const list = await request(server)
        .get('/api/mappings?generalConceptId=1')
        .expect(200);
      const mappings: MappingBody[] = list.body;
      expect(mappings.map((m) => m.omopConceptId)).toEqual([100, 101, 102]);

      const derived = mappings.find(
        (m) => m.provenance === MappingProvenance.DERIVED,
      );
      if (!derived) throw new Error('expected a derived mapping');

      const toggled = await request(server)
        .patch(`/api/mappings/${derived.mappingId}/recommended`)
        .send({ recommended: true })
        .expect(200);
      expect(toggled.body.recommended).toBe(true);

      await request(server)
        .delete(`/api/mappings/${derived.mappingId}`)
        .expect(400);
    });
  });
});
