export class AddCustomerCommand {
  constructor(
    readonly customerId: string,
    readonly companyName: string,
    readonly country: string | null = null
  ) {}
}
