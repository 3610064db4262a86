/**
 * Argument prefixes understood by the command parsers. Some groups reuse a
 * token for a different field: `n/` is a contact name or an item name and
 * `p/` a phone number or a unit price.
 */
export enum Prefix {
  ContactIndex = 'i/',
  Name = 'n/',
  ItemName = 'n/',
  Phone = 'p/',
  Price = 'p/',
  Email = 'e/',
  Address = 'a/',
  Remark = 'r/',
  Message = 'm/',
  Date = 'd/',
  Duration = 'du/',
  Quantity = 'q/',
  Tag = 't/',
  ContactTags = 'c/',
  SaleTags = 's/',
  Months = 'mo/',
}
