export interface Publisher {
  id: number;
  name: string;
  description: string;
  createdAt: Date;
}

export interface CreatePublisherDTO {
  name: string;
  description?: string;
}
