import {
  MemoryIndex,
  between,
  collect,
  createConsoleLogger,
  fetchFrom,
  firstField,
  paginate,
  type SqliteIndexEntry,
} from '../src';

type Customer = { id: number; balance: number };

const logger = createConsoleLogger({ prefix: 'customers', verbose: true });

// Documents by ref, plus an index over their ids
const documents = new Map<string, Customer>();
const customerIds = new MemoryIndex<SqliteIndexEntry>('customer_id_filter');

async function saveAll(customers: Customer[]) {
  const entries: SqliteIndexEntry[] = customers.map(c => {
    const ref = `customers/${documents.size + 1}`;
    documents.set(ref, c);
    return [c.id, ref];
  });
  return customerIds.putMany(entries);
}

function load([, ref]: SqliteIndexEntry): Customer {
  const customer = documents.get(ref);
  if (!customer) throw new Error(`Document ${ref} not found`);
  return customer;
}

async function main() {
  await saveAll([
    { id: 101, balance: 200 },
    { id: 102, balance: 300 },
    { id: 103, balance: 400 },
    { id: 104, balance: 500 },
  ]);
  const created = await saveAll(Array.from({ length: 20 }, (_, i) => ({ id: i + 1, balance: (i + 1) * 10 })));
  console.log(`Created ${created} customers`);

  // Point lookup
  const [first] = await customerIds.lookup(1);
  console.log('Customer 1:', first && load(first));

  // A list of ids
  const some = await customerIds.lookupMany([1, 3, 6, 7]);
  console.log('Customers 1, 3, 6, 7:', some.map(load));

  // Below 5: the store stops at the bound
  const below = await collect(paginate({
    index: customerIds.name,
    fetch: fetchFrom(customerIds),
    upperBound: 4,
    materialize: load,
    logger,
  }));
  console.log('Customers below 5:', below);

  const inRange = await collect(paginate({
    index: customerIds.name,
    fetch: fetchFrom(customerIds),
    materialize: load,
    logger,
    ...between<SqliteIndexEntry>({ lower: 5, upper: 11 }, firstField),
  }));
  console.log('Customers 5 to 11:', inRange);

  // Everything, 8 at a time
  const all = paginate({
    index: customerIds.name,
    fetch: fetchFrom(customerIds),
    pageSize: 8,
    materialize: load,
    logger,
  });
  for await (const customer of all) {
    console.log('Next customer:', customer);
  }
  console.log(`Read all customers in ${all.fetchCount} pages`);
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
