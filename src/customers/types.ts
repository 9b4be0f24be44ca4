export interface Customer {
  customerId: string;
  companyName: string;
}
