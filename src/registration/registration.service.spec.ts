import {
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { RegistrationService } from './registration.service';
import { RegistrationEntity } from './infrastructure/persistence/relational/entities/registration.entity';
import { EventQueryService } from '../event/services/event-query.service';
import { HowHeard } from '../core/constants/constant';
import {
  buildEvent,
  mockEventEmitter,
  mockEventQueryService,
  mockUser,
} from '../test/mocks';

describe('RegistrationService', () => {
  let service: RegistrationService;
  const registrationRepository = {
    create: jest.fn(),
    save: jest.fn(),
    find: jest.fn(),
    count: jest.fn(),
  };

  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RegistrationService,
        {
          provide: getRepositoryToken(RegistrationEntity),
          useValue: registrationRepository,
        },
        { provide: EventQueryService, useValue: mockEventQueryService },
        { provide: EventEmitter2, useValue: mockEventEmitter },
      ],
    }).compile();

    service = module.get<RegistrationService>(RegistrationService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('create', () => {
    it('registers the user while spots are left', async () => {
      const event = buildEvent({ id: 4, capacity: 2, registrationsCount: 1 });
      mockEventQueryService.findOne.mockResolvedValue(event);
      registrationRepository.create.mockImplementation((registration) =>
        Object.assign(new RegistrationEntity(), registration),
      );
      registrationRepository.save.mockImplementation(async (registration) =>
        Object.assign(registration, { id: 21 }),
      );

      const registration = await service.create(4, mockUser, {
        howHeard: HowHeard.Twitter,
      });

      expect(registration.id).toBe(21);
      expect(registration.howHeard).toBe('Twitter');
      expect(registration.event).toBe(event);
      expect(registration.user).toBe(mockUser);
      expect(mockEventEmitter.emit).toHaveBeenCalledWith(
        'registration.created',
        { registrationId: 21, eventId: 4, userId: mockUser.id },
      );
    });

    it('rejects a sold-out event', async () => {
      mockEventQueryService.findOne.mockResolvedValue(
        buildEvent({ id: 4, capacity: 2, registrationsCount: 2 }),
      );

      await expect(
        service.create(4, mockUser, { howHeard: HowHeard.Newsletter }),
      ).rejects.toThrow(UnprocessableEntityException);
      expect(registrationRepository.save).not.toHaveBeenCalled();
      expect(mockEventEmitter.emit).not.toHaveBeenCalled();
      expect(JSON.parse(warnSpy.mock.calls[0][0])).toMatchObject({
        level: 'warn',
        message: 'registration rejected',
        context: { eventId: 4, userId: mockUser.id, reason: 'sold out' },
      });
    });

    it('propagates NotFoundException for an unknown event', async () => {
      mockEventQueryService.findOne.mockRejectedValue(
        new NotFoundException('Event with id 99 not found'),
      );

      await expect(
        service.create(99, mockUser, { howHeard: HowHeard.Other }),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('findAllForEvent', () => {
    it('lists registrations newest first with their users', async () => {
      mockEventQueryService.findOne.mockResolvedValue(buildEvent({ id: 4 }));
      registrationRepository.find.mockResolvedValue([]);

      await service.findAllForEvent(4);

      expect(registrationRepository.find).toHaveBeenCalledWith({
        where: { event: { id: 4 } },
        relations: { user: true },
        order: { createdAt: 'DESC', id: 'DESC' },
      });
    });
  });

  describe('countForEvent', () => {
    it('counts the registrations of the event', async () => {
      registrationRepository.count.mockResolvedValue(3);

      expect(await service.countForEvent(4)).toBe(3);
      expect(registrationRepository.count).toHaveBeenCalledWith({
        where: { event: { id: 4 } },
      });
    });
  });
});
