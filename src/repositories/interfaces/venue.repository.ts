import { BaseRepository } from './base.repository';
import { NewVenue, Venue } from '../../types/entity.types';

export type VenueRepository = BaseRepository<Venue, NewVenue>;
