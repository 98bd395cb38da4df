/** A project groups related events */
export interface Project {
  id: string;
  name: string;
  description: string | null;
  ownerId: string;
  createdAt: Date;
  updatedAt: Date;
}

/** GET /api/projects */
export interface ProjectListResponse {
  projects: Project[];
  total: number;
}
