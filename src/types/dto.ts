// Response shapes of the alert endpoints

export interface PersonContactDTO {
  firstName: string;
  lastName: string;
  address: string;
  phone: string;
}

export interface ChildInfoDTO {
  firstName: string;
  lastName: string;
  age: number;
}

export interface ChildAlertDTO {
  children: ChildInfoDTO[];
  familyMembers: PersonContactDTO[];
}

export interface ResidentMedicalDTO {
  lastName: string;
  phone: string;
  fireStation: string | null;
  age: number;
  medications: string[];
  allergies: string[];
}

export interface FireAlertDTO {
  persons: ResidentMedicalDTO[];
}

export interface PersonInfoDTO {
  firstName: string;
  lastName: string;
  address: string;
  age: number;
  email: string;
  medications: string[];
  allergies: string[];
}

export interface PersonInfoByLastNameDTO {
  lastName: string;
  personInfoList: PersonInfoDTO[];
}

export interface CommunityEmailDTO {
  city: string;
  emails: string[];
}

export interface StationCoverageDTO {
  people: PersonContactDTO[];
  adultCount: number;
  childCount: number;
}

export interface PhoneAlertDTO {
  phones: string[];
}

export interface AddressResidentsDTO {
  address: string;
  persons: ResidentMedicalDTO[];
}

export interface FloodStationDTO {
  fireStation: string;
  persons: AddressResidentsDTO[];
}

export interface FloodDTO {
  fireStationAddressPersonMedicalRecords: FloodStationDTO[];
}
