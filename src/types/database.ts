export type Json = string | number | boolean | null | { [key: string]: Json | undefined } | Json[];

export interface Database {
  public: {
    Tables: {
      saved_trips: {
        Row: {
          id: string;
          user_id: string;
          title: string;
          origin: string;
          destination: string;
          start_date: string;
          end_date: string;
          budget: string;
          preferences: Json;
          itinerary: Json;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: string;
          user_id: string;
          title: string;
          origin: string;
          destination: string;
          start_date: string;
          end_date: string;
          budget: string;
          preferences: Json;
          itinerary: Json;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          id?: string;
          user_id?: string;
          title?: string;
          origin?: string;
          destination?: string;
          start_date?: string;
          end_date?: string;
          budget?: string;
          preferences?: Json;
          itinerary?: Json;
          created_at?: string;
          updated_at?: string;
        };
        Relationships: [
          {
            foreignKeyName: "saved_trips_user_id_fkey";
            columns: ["user_id"];
            referencedRelation: "users";
            referencedColumns: ["id"];
          },
        ];
      };
    };
    Views: Record<string, never>;
    Enums: Record<string, never>;
    Functions: {
      set_updated_at: {
        Args: Record<string, never>;
        Returns: unknown;
      };
    };
  };
}

export type Tables<T extends keyof Database["public"]["Tables"]> =
  Database["public"]["Tables"][T]["Row"];
