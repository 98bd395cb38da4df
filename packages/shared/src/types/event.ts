/** An event on the calendar, owned by the user who created it */
export interface EventItem {
  id: string;
  title: string;
  description: string | null;
  location: string | null;
  startsAt: Date;
  endsAt: Date;
  /** Project the event belongs to, if any */
  projectId: string | null;
  ownerId: string;
  /** IDs of users who joined the event */
  participantIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

/** GET /api/events and GET /api/projects/:id/events */
export interface EventListResponse {
  events: EventItem[];
  total: number;
}
