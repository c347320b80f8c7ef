export const ALL = "All";

export type Selection = string;

export interface FilterCriteria {
  startDate: string;
  endDate: string;
  platform: Selection;
  userType: Selection;
}

export interface FilterOptions {
  minDate: string | null;
  maxDate: string | null;
  platforms: string[];
  userTypes: string[];
}
