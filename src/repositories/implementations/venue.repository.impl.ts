import { BaseRepositoryImpl } from './base.repository.impl';
import { VenueRepository } from '../interfaces/venue.repository';
import { VENUE_DESCRIPTOR } from '../descriptors';
import { NewVenue, Venue } from '../../types/entity.types';
import { Session } from '../../types/session.types';

export class VenueRepositoryImpl
  extends BaseRepositoryImpl<Venue, 'venue_id', NewVenue>
  implements VenueRepository
{
  constructor(session: Session) {
    super(session, VENUE_DESCRIPTOR);
  }
}
