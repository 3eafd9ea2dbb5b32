export const DEMO_CUSTOMERS: ReadonlyArray<[name: string, email: string, phone: string, address: string]> = [
  ['Mara Lindqvist', 'mara@example.com', '555-0101', '12 Harbor Rd'],
  ['Tomas Okafor', 'tomas@example.com', '555-0102', '48 Birch Ln'],
  ['Ines Duarte', 'ines@example.com', '555-0103', '7 Quarry St'],
  ['Kenji Mori', 'kenji@example.com', '555-0104', '230 Ridge Ave'],
  ['Ada Whitfield', 'ada@example.com', '555-0105', '91 Mill Ct'],
];

export const DEMO_PRODUCTS: ReadonlyArray<[name: string, description: string, price: number, stockQuantity: number]> = [
  ['Laptop', '14-inch ultralight laptop', 1200.0, 10],
  ['Smartphone', 'Dual-SIM smartphone', 800.0, 15],
  ['Tablet', '10-inch tablet', 300.0, 20],
  ['Headphones', 'Over-ear wireless headphones', 150.0, 30],
  ['Monitor', '27-inch 4K monitor', 350.0, 8],
];

export const DEMO_SALES: ReadonlyArray<[customerId: number, saleDate: string, totalAmount: number]> = [
  [1, '2024-01-15', 3200.0],
  [2, '2024-01-20', 750.0],
  [3, '2024-02-05', 200.0],
  [4, '2024-02-10', 600.0],
  [5, '2024-03-01', 2550.0],
  [1, '2024-03-15', 550.0],
  [2, '2024-04-02', 650.0],
];

export const DEMO_SALE_ITEMS: ReadonlyArray<[saleId: number, productId: number, quantity: number, price: number]> = [
  [1, 1, 1, 3200.0],
  [2, 2, 1, 600.0],
  [2, 4, 1, 250.0],
  [3, 3, 1, 400.0],
  [4, 4, 2, 550.0],
  [4, 3, 1, 500.0],
  [5, 1, 1, 2200.0],
  [5, 4, 1, 450.0],
  [5, 5, 1, 500.0],
  [6, 4, 1, 250.0],
  [7, 5, 1, 350.0],
];
