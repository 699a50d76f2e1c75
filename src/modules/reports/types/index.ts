export type SalesSummaryRow = {
  id: number;
  name: string;
  category: string | null;
  price: number | null;
  total_sales: number;
  /** null when the product has no sales */
  total_quantity_sold: number | null;
  /** price * total_quantity_sold rounded to cents; null when the product has no sales */
  total_revenue: number | null;
};

export type HighValueProductRow = {
  name: string;
  category: string | null;
  price: number;
  stock: number | null;
  formatted_price: number;
};

export type ProductListingRow = {
  id: number;
  name: string;
  price: number | null;
  category: string | null;
  stock: number | null;
};

export interface ReportRows {
  'sales-summary': SalesSummaryRow;
  'high-value-products': HighValueProductRow;
  'products': ProductListingRow;
}

export type ReportSlug = keyof ReportRows;

export interface ReportDefinition {
  slug: ReportSlug;
  title: string;
  file: string;
}

export const REPORTS: Record<ReportSlug, ReportDefinition> = {
  'sales-summary': {
    slug: 'sales-summary',
    title: 'Sales summary per product',
    file: 'sales_summary.sql',
  },
  'high-value-products': {
    slug: 'high-value-products',
    title: 'Products priced above average',
    file: 'high_value_products.sql',
  },
  'products': {
    slug: 'products',
    title: 'All products',
    file: 'get_all_products.sql',
  },
};
