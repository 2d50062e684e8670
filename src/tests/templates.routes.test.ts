import request from 'supertest';
import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import type { ProjectTemplate } from '@/db/schema/projects.js';
import type { TemplateService } from '@/services/templates.js';

const templateServiceMock = {
  list: jest.fn<TemplateService['list']>(),
  create: jest.fn<TemplateService['create']>(),
  delete: jest.fn<TemplateService['delete']>(),
};

jest.mock('@/config/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

jest.mock('@/services/templates', () => ({
  TemplateService: jest.fn(() => templateServiceMock),
}));

import { templatesRouter } from '@/routes/templates.js';
import { NotFoundError } from '@/shared/errors.js';
import { mountRouter } from './route-app.js';

const app = mountRouter(templatesRouter);

const template: ProjectTemplate = {
  id: 'template-1',
  userId: 'user-1',
  name: 'Noir serial',
  genreTone: 'noir',
  musicalAtmosphere: null,
  includeSoundEffects: true,
  includeBackgroundMusic: false,
  targetDurationMinutes: 15,
  coverStyle: null,
  charactersJson: null,
  createdAt: new Date('2026-01-15T10:00:00.000Z'),
};

describe('template routes', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('GET / lists the templates of the caller', async () => {
    templateServiceMock.list.mockResolvedValue([template]);

    const response = await request(app).get('/');

    expect(response.status).toBe(200);
    expect(templateServiceMock.list).toHaveBeenCalledWith('user-1');
    expect(response.body).toEqual([
      {
        id: 'template-1',
        name: 'Noir serial',
        genre_tone: 'noir',
        musical_atmosphere: null,
        include_sound_effects: true,
        include_background_music: false,
        target_duration_minutes: 15,
        cover_style: null,
        characters: [],
        created_at: '2026-01-15T10:00:00.000Z',
      },
    ]);
  });

  it('POST / stores a template with defaults filled in', async () => {
    templateServiceMock.create.mockResolvedValue(template);

    const response = await request(app)
      .post('/')
      .send({ name: 'Noir serial', characters: [{ role: 'lead', character_name: 'Mara' }] });

    expect(response.status).toBe(201);
    expect(templateServiceMock.create).toHaveBeenCalledWith('user-1', {
      name: 'Noir serial',
      genreTone: null,
      musicalAtmosphere: null,
      includeSoundEffects: true,
      includeBackgroundMusic: true,
      targetDurationMinutes: 10,
      coverStyle: null,
      charactersJson: [{ role: 'lead', character_name: 'Mara' }],
    });
  });

  it('POST / rejects durations over an hour', async () => {
    const response = await request(app).post('/').send({ name: 'Long', target_duration_minutes: 61 });

    expect(response.status).toBe(422);
    expect(templateServiceMock.create).not.toHaveBeenCalled();
  });

  it('DELETE /:templateId removes a template of the caller', async () => {
    templateServiceMock.delete.mockResolvedValue(undefined);

    const response = await request(app).delete('/template-1');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: 'Template deleted' });
    expect(templateServiceMock.delete).toHaveBeenCalledWith('user-1', 'template-1');
  });

  it('DELETE /:templateId reports templates of other users as missing', async () => {
    templateServiceMock.delete.mockRejectedValue(new NotFoundError('Template'));

    const response = await request(app).delete('/template-9');

    expect(response.status).toBe(404);
    expect(response.body.message).toBe('Template not found');
  });
});
