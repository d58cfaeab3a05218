// Wire shapes; ids are hex strings and dates ISO-8601.

export interface AddressResponseDto {
  id: string;
  label: string;
  street: string;
  city: string;
  primary: boolean;
  createdAt: string;
  updatedAt?: string;
}

/** Stored password hashes never leave the service. */
export interface UserResponseDto {
  id: string;
  email: string;
  name: string;
  addresses: AddressResponseDto[];
  createdAt: string;
  updatedAt?: string;
}

export interface CountResponseDto {
  count: number;
}
