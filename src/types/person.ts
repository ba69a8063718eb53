export interface Person {
  id: string;
  name: string;
  createdAt: string;
  updatedAt: string;
}

export interface PersonDTO {
  id: string;
  name: string;
  created_at: string;
  updated_at: string;
}

export function toDTO(person: Person): PersonDTO {
  return {
    id: person.id,
    name: person.name,
    created_at: person.createdAt,
    updated_at: person.updatedAt,
  };
}
