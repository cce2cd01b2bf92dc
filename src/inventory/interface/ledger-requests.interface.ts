export interface CreateItemRequest {
  id: number;
  name: string;
  category: string;
  quantity: number;
  price: number;
}

export interface UpdateItemRequest {
  id?: number;
  name?: string;
  category?: string;
  quantity?: number;
  lastPrice?: number;
}

export interface SellRequest {
  itemId: number;
  quantity: number;
  unitPrice: number;
}

export interface RestockRequest {
  itemId: number;
  quantity: number;
}
